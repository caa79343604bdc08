#!/usr/bin/env node
import { main } from './server.js';
import { LOG_PREFIX, errorMessage } from '../shared/errors.js';

main(process.argv).catch((err: unknown) => {
  console.error(`${LOG_PREFIX} MCP server failed: ${errorMessage(err)}`);
  process.exitCode = 1;
});
