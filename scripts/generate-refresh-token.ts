import { randomBytes } from "node:crypto";
import { buildAuthUrl, exchangeCodeForToken, openBrowser, waitForAuthorizationCode } from "../src/auth";
import { loadAuthConfig } from "../src/config";
import { describeError } from "../src/logger";

async function main(): Promise<void> {
  const config = loadAuthConfig();
  const state = randomBytes(16).toString("hex");
  const authUrl = buildAuthUrl({ clientId: config.spotifyClientId, redirectUri: config.redirectUri, state });

  console.log("Opening Spotify authorization URL in your browser...");
  console.log("If it does not open automatically, use this URL:\n");
  console.log(authUrl);
  console.log(`\nWaiting up to ${Math.round(config.timeoutMs / 60_000)} minute(s) for the callback.`);
  openBrowser(authUrl);

  const code = await waitForAuthorizationCode(config, state, AbortSignal.timeout(config.timeoutMs));
  const token = await exchangeCodeForToken({
    code,
    clientId: config.spotifyClientId,
    clientSecret: config.spotifyClientSecret,
    redirectUri: config.redirectUri
  });

  console.log("\nRefresh token generated successfully. Add this to your .env:");
  console.log(`SPOTIFY_REFRESH_TOKEN=${token.refreshToken}`);
}

main().catch((error) => {
  console.error(`Auth helper failed: ${describeError(error)}`);
  process.exitCode = 1;
});
