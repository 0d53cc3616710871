import http from "node:http";

const PORT = Number(process.env.UPSTREAM_PORT ?? 3001);

// path -> [status, Location]
const CHAIN: Record<string, [number, string | undefined]> = {
  "/": [301, "/foo"],
  "/foo": [308, "/bar"],
  "/bar": [302, "/baz"],
  "/baz": [307, "/quux"],
  "/quux": [303, "/other"],
  "/other": [202, undefined],
  "/loop": [302, "/loop"],
  "/dangling": [307, undefined],
};

const server = http.createServer((req, res) => {
  if (!req.url) {
    res.statusCode = 400;
    return res.end("bad request");
  }

  const path = req.url.split("?")[0];
  const hop = CHAIN[path];
  if (!hop) {
    res.statusCode = 404;
    return res.end("not found");
  }

  const [status, location] = hop;
  res.statusCode = status;
  if (location) res.setHeader("location", location);
  res.setHeader("content-type", "application/json");
  res.end(JSON.stringify({ path, method: req.method, status }));
});

server.listen(PORT, "127.0.0.1", () => {
  // eslint-disable-next-line no-console
  console.log(`[upstream] redirect chain on http://127.0.0.1:${PORT} (try /, /loop, /dangling)`);
});
