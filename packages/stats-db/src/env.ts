import * as dotenv from "dotenv";
import { cleanEnv, num, str } from "envalid";

// Load environment variables from .env file
dotenv.config();

const env = cleanEnv(process.env, {
  CONDA_CHANNELS: str({ default: "bioconda" }),
  BREAKDOWN_LIMIT: num({ default: 50 }),
  CHANNEL_BREAKDOWN_LIMIT: num({ default: 200 }),
  RECENT_WINDOW_DAYS: num({ default: 62 }),
  CONCURRENT_TASKS: num({ default: 30 }),
  MAX_RETRIES: num({ default: 3 }),
  AS_OF_DATE: str({ default: "" }),
  EXPORT_DIR: str({ default: "package-downloads" }),
});

export function channels(): string[] {
  return env.CONDA_CHANNELS.split(",")
    .map((channel) => channel.trim())
    .filter((channel) => channel.length > 0);
}

export default env;
