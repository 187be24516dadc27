// CLI commands
export { runCommand } from './run';
export { readmeCommand } from './readme';
export { prepareRun, type PreparedRun } from './prepare';
