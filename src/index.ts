/**
 * Entry point for the item store
 */

import { getPort } from "#lib/config.ts";
import { initDb } from "#lib/db/migrations/index.ts";
import { ErrorCode, logDebug, logError } from "#lib/logger.ts";
import { handleRequest } from "#routes/index.ts";
import { startServer } from "./server.ts";

const main = async (): Promise<void> => {
  const port = getPort();
  await initDb();
  await startServer(port, handleRequest);
  logDebug("Server", `listening on http://localhost:${port}`);
};

main().catch((error: unknown) => {
  logError({ code: ErrorCode.SERVER_START, detail: String(error) });
  process.exit(1);
});
