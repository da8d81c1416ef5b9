import { run } from './cli';

/**
 * Main
 * Places the order described by the command line and exits with its status
 */
process.exitCode = await run(process.argv.slice(2));
