import http from "node:http";

export function statusLine(status: number): string {
  return `${status} ${http.STATUS_CODES[status] ?? "Unknown"}`;
}

/**
 * Minimal HTML page for an error status. Carries the status line only, never
 * details of the underlying failure.
 */
export function renderErrorPage(status: number): string {
  const title = statusLine(status);
  return `<!doctype html>
<html>
<head><meta charset="utf-8"><title>${title}</title></head>
<body><h1>${title}</h1></body>
</html>
`;
}

export function sendError(
  req: http.IncomingMessage,
  res: http.ServerResponse,
  status: number,
  headers: http.OutgoingHttpHeaders = {},
): void {
  const body = renderErrorPage(status);
  res.writeHead(status, {
    ...headers,
    "content-type": "text/html; charset=utf-8",
    "content-length": Buffer.byteLength(body),
  });
  res.end(req.method === "HEAD" ? undefined : body);
}

/**
 * Path part of a request target, query stripped, still percent-encoded.
 */
export function pathnameOf(target: string | undefined): string {
  const url = target ?? "/";
  const queryStart = url.indexOf("?");
  return queryStart === -1 ? url : url.slice(0, queryStart);
}
