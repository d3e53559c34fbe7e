// env first: it loads .env before the db client reads SQLITE_PATH
import env, { channels } from "../../env";
import { AnacondaApiClient } from "../../conda-client";
import { exportToJsonFiles } from "./conda.exports";
import { printPackageNames } from "./fetch-package-names";
import { runRollup } from "./rollup";

const COMMANDS = ["fetch:package-names", "rollup", "export"];

async function runCommand(command: string): Promise<void> {
  console.log(`Executing conda task: ${command}`);

  switch (command) {
    case "fetch:package-names":
      await printPackageNames(
        new AnacondaApiClient({ maxRetries: env.MAX_RETRIES }),
        channels()
      );
      break;

    case "rollup": {
      const summary = await runRollup();
      if (summary.partial) {
        console.log("Rollup finished with failures, see above.");
      }
      break;
    }

    case "export":
      await exportToJsonFiles();
      break;

    default:
      throw new Error(
        `Unknown command: ${command}. Expected one of: ${COMMANDS.join(", ")}`
      );
  }
}

if (require.main === module) {
  const command = process.argv[2];
  if (!command) {
    console.error(`Please provide a command: ${COMMANDS.join(", ")}`);
    process.exit(1);
  }

  runCommand(command)
    .then(() => {
      console.log("Command completed successfully!");
      process.exit(0);
    })
    .catch((error) => {
      console.error("Command failed:", error);
      process.exit(1);
    });
}

export { runCommand };
