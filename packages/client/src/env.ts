import { cleanEnv, str } from "envalid";

const env = cleanEnv(process.env, {
  SQLITE_PATH: str({ default: "sqlite.db" }),
});

export default env;
