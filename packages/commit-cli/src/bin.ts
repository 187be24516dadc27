import { createProgram } from './cli/program';
import { createTerminalUI } from './cli/context';

const ui = createTerminalUI();

createProgram({ cwd: process.cwd(), env: process.env, ui })
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    ui.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  });
