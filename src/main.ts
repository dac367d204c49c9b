#!/usr/bin/env node

/**
 * Entry point for the local memory store
 *
 * Starts the MCP server on stdio for use with AI clients
 */

import("./index.js").catch((err: unknown) => {
  console.error("Error starting MCP server:", err);
  process.exit(1);
});
