import { readFile } from "node:fs/promises";
import { config as loadDotenv } from "dotenv";
import { runCli } from "./cli.js";

loadDotenv();

runCli({
  argv: process.argv.slice(2),
  env: process.env,
  stdout: (text) => {
    process.stdout.write(`${text}\n`);
  },
  stderr: (text) => {
    process.stderr.write(`${text}\n`);
  },
  readFile: (path) => readFile(path, "utf8"),
})
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error("[kbconnect] Fatal error:", err);
    process.exit(1);
  });
