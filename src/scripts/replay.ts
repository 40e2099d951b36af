#!/usr/bin/env node
import { main } from '../infra/cli/replayCommand.js';

main(process.argv.slice(2))
  .then((exitCode) => {
    // exitCode rather than exit() so piped stdout is flushed
    process.exitCode = exitCode;
  })
  .catch((error) => {
    console.error('Fatal error:', error);
    process.exitCode = 1;
  });
