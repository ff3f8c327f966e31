/**
 * @module index
 * Executable entry for the `testpattern` binary.
 */

import { run } from './cli';

process.exitCode = await run(process.argv.slice(2));
