import { runCli } from "./cli";
import { printCliError } from "./output";

runCli(process.argv.slice(2), {
  output: process.stdout,
  errorOutput: process.stderr,
  isTTY: process.stdout.isTTY
})
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error) => {
    printCliError(error instanceof Error ? error.message : String(error));
    process.exit(1);
  });
