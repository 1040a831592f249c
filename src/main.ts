/**
 * Command line entry point
 */

import { loadConfig } from "./config";
import { generateIndex } from "./index";
import { FetchHttpClient } from "./services/http-client";

async function main(): Promise<void> {
  const config = loadConfig(process.env);
  console.log(`INFO: Writing index to ${config.outputDir}`);

  const result = await generateIndex(config, { http: new FetchHttpClient() });
  if (result.status === "aborted") {
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  console.error("ERROR: Fatal error during index generation:", error);
  process.exitCode = 1;
});
