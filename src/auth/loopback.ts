import { createServer } from "node:http";
import { AuthTokenError } from "../utils/errors.js";

export const CALLBACK_PATH = "/oauth2callback";

export function redirectUriFor(port: number): string {
  return `http://localhost:${port}${CALLBACK_PATH}`;
}

/**
 * Listens on localhost until Google redirects the browser back with an
 * authorization code, then closes the listener and resolves with the code.
 * `onListening` runs once the port is bound; that is when the browser should be opened.
 */
export function waitForAuthorizationCode(
  port: number,
  onListening: () => void,
): Promise<string> {
  return new Promise((resolve, reject) => {
    const server = createServer((req, res) => {
      const url = new URL(req.url ?? "/", `http://localhost:${port}`);
      if (url.pathname !== CALLBACK_PATH) {
        res.writeHead(404);
        res.end("Not found");
        return;
      }

      const denied = url.searchParams.get("error");
      if (denied) {
        res.writeHead(400, { "Content-Type": "text/html" });
        res.end("<html><body><h1>Authorization failed</h1>You can close this window.</body></html>");
        server.close();
        reject(new AuthTokenError(`Authorization was denied: ${denied}`));
        return;
      }

      const code = url.searchParams.get("code");
      if (!code) {
        res.writeHead(400);
        res.end("Missing code");
        return;
      }

      res.writeHead(200, { "Content-Type": "text/html" });
      res.end("<html><body><h1>Authentication successful</h1>You can close this window.</body></html>");
      server.close();
      resolve(code);
    });

    server.once("error", reject);
    server.listen(port, "localhost", onListening);
  });
}
