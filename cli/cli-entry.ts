/**
 * Main entry point for the textblocks CLI application.
 */
/// <reference types="node" />
import { main } from './index';

export { main };

main(process.argv.slice(2))
  .then(exitCode => {
    process.exit(exitCode);
  })
  .catch((error: unknown) => {
    console.error(error);
    process.exit(1);
  });
