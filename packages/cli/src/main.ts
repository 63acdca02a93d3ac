import { runCli, EXIT_FAILURE } from "./run";

const controller = new AbortController();
const stop = (): void => controller.abort();
process.once("SIGINT", stop);
process.once("SIGTERM", stop);

let code: number;
try {
  code = await runCli(process.argv.slice(2), {
    stdout: process.stdout,
    stderr: process.stderr,
    signal: controller.signal,
  });
} catch (err) {
  console.error(err);
  code = EXIT_FAILURE;
}

// A live port read may still be pending after cancellation
process.exit(code);
