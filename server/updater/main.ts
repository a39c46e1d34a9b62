#!/usr/bin/env node
import { createUpdaterApp } from "./app.js";
import { createUpdaterProgram, promptConfirm } from "./cli.js";
import { createUpdaterService } from "./service.js";

const program = createUpdaterProgram({
  env: process.env,
  cwd: process.cwd(),
  isInteractive: Boolean(process.stdin.isTTY && process.stdout.isTTY),
  log: (message) => console.log(message),
  error: (message) => console.error(message),
  setExitCode: (code) => {
    process.exitCode = code;
  },
  confirm: promptConfirm,
  createService: (config) => createUpdaterService(config),
  serve: (config, service) =>
    new Promise<void>((resolve, reject) => {
      const server = createUpdaterApp(config, service).listen(config.port, () => {
        console.log(`[updater] control API listening on http://localhost:${config.port}`);
        resolve();
      });
      server.once("error", reject);
    })
});

await program.parseAsync(process.argv);
