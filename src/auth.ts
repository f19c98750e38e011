import { spawn } from "node:child_process";
import http from "node:http";
import type { AuthConfig } from "./config";
import { buildErrorMessage, SPOTIFY_ACCOUNTS_BASE, SpotifyApiError } from "./spotify-client";

export const SPOTIFY_SCOPES = [
  "user-library-read",
  "user-library-modify",
  "playlist-read-private",
  "playlist-modify-public",
  "playlist-modify-private",
  "ugc-image-upload"
] as const;

export function buildAuthUrl(params: { clientId: string; redirectUri: string; state: string }): string {
  const query = new URLSearchParams({
    client_id: params.clientId,
    response_type: "code",
    redirect_uri: params.redirectUri,
    scope: SPOTIFY_SCOPES.join(" "),
    state: params.state
  });

  return `https://accounts.spotify.com/authorize?${query.toString()}`;
}

export function openBrowser(url: string): void {
  const platform = process.platform;

  if (platform === "win32") {
    spawn("cmd", ["/c", "start", "", url], { detached: true, stdio: "ignore" }).unref();
    return;
  }

  if (platform === "darwin") {
    spawn("open", [url], { detached: true, stdio: "ignore" }).unref();
    return;
  }

  spawn("xdg-open", [url], { detached: true, stdio: "ignore" }).unref();
}

export type CallbackResult = { ok: true; code: string } | { ok: false; status: number; message: string };

export function parseCallback(requestUrl: URL, expectedState: string): CallbackResult {
  const error = requestUrl.searchParams.get("error");
  if (error) {
    return { ok: false, status: 400, message: `Spotify auth failed: ${error}` };
  }

  const code = requestUrl.searchParams.get("code");
  const returnedState = requestUrl.searchParams.get("state");
  if (!code || !returnedState) {
    return { ok: false, status: 400, message: "Missing code/state in callback." };
  }

  if (returnedState !== expectedState) {
    return { ok: false, status: 403, message: "State mismatch in OAuth callback." };
  }

  return { ok: true, code };
}

export function waitForAuthorizationCode(
  config: Pick<AuthConfig, "port" | "redirectUri">,
  expectedState: string,
  signal?: AbortSignal
): Promise<string> {
  const callbackPath = new URL(config.redirectUri).pathname;

  return new Promise<string>((resolve, reject) => {
    const server = http.createServer((req, res) => {
      const requestUrl = req.url ? new URL(req.url, `http://127.0.0.1:${config.port}`) : null;

      if (!requestUrl || requestUrl.pathname !== callbackPath) {
        res.statusCode = 404;
        res.end("Not found");
        return;
      }

      const result = parseCallback(requestUrl, expectedState);
      signal?.removeEventListener("abort", onAbort);

      if (!result.ok) {
        res.statusCode = result.status;
        res.end(result.message);
        server.close(() => reject(new Error(result.message)));
        return;
      }

      res.statusCode = 200;
      res.setHeader("Content-Type", "text/html; charset=utf-8");
      res.end("<html><body><h1>Login Completed!</h1><p>You can close this window now.</p></body></html>");
      server.close(() => resolve(result.code));
    });

    const onAbort = (): void => {
      server.close(() => reject(signal?.reason));
    };

    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }

    signal?.addEventListener("abort", onAbort, { once: true });
    server.on("error", (error) => {
      signal?.removeEventListener("abort", onAbort);
      reject(error);
    });
    server.listen(config.port, "127.0.0.1");
  });
}

export async function exchangeCodeForToken(
  input: { code: string; clientId: string; clientSecret: string; redirectUri: string },
  fetchImpl: typeof fetch = fetch
): Promise<{ refreshToken: string; accessToken: string }> {
  const body = new URLSearchParams({
    grant_type: "authorization_code",
    code: input.code,
    redirect_uri: input.redirectUri,
    client_id: input.clientId,
    client_secret: input.clientSecret
  });

  const response = await fetchImpl(`${SPOTIFY_ACCOUNTS_BASE}/token`, {
    method: "POST",
    headers: {
      "Content-Type": "application/x-www-form-urlencoded"
    },
    body: body.toString()
  });

  const text = await response.text();
  if (!response.ok) {
    throw new SpotifyApiError(response.status, buildErrorMessage(response.status, text));
  }

  const parsed = JSON.parse(text) as { refresh_token?: string; access_token?: string };
  if (!parsed.refresh_token || !parsed.access_token) {
    throw new Error("Spotify token response did not include refresh_token.");
  }

  return { refreshToken: parsed.refresh_token, accessToken: parsed.access_token };
}
