#!/usr/bin/env node
/**
 * GitHub App token tool
 *
 * Creates a JWT for GitHub App authentication and exchanges it for an
 * installation token, lists the app's installations, or revokes a token.
 *
 * Usage:
 *   github-app-token generate --key <PRIVATE_KEY_PATH> --app_id <APP_ID> [--installation_id <ID>]
 *   github-app-token installations --base64_key <BASE64_PEM> --app_id <APP_ID>
 *   github-app-token revoke --token <TOKEN>
 */

import { runCli } from "../lib/cli.js";

async function main() {
  process.exitCode = await runCli(process.argv.slice(2));
}

main().catch((error) => {
  console.error("❌ Error:", error);
  process.exit(1);
});
