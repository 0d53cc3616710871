import { createRequest, followRedirectsMax } from "../src/client.js";
import { loadConfig } from "../src/config.js";
import { createUndiciTransport } from "../src/http.js";
import { createLogger } from "../src/logger.js";

const UPSTREAM = process.env.UPSTREAM ?? "http://127.0.0.1:3001";
const PATHS = (process.env.PATHS ?? "/,/loop,/dangling").split(",");

const config = loadConfig();
const transport = createUndiciTransport({ requestTimeoutMs: config.requestTimeoutMs });
const client = followRedirectsMax(transport, config.maxRedirects, {
  hostComparison: config.hostComparison,
  logger: createLogger({ level: config.logLevel }),
});

client.on("request:redirect", ({ hop }) => {
  // eslint-disable-next-line no-console
  console.log(`[redirect] ${hop.status} ${hop.method} ${hop.from} -> ${hop.to} (left: ${hop.remainingRedirects})`);
});

async function main() {
  for (const path of PATHS) {
    const res = await client.request(
      createRequest(`${UPSTREAM}${path}`, { method: "POST", body: JSON.stringify({ path }) })
    );
    // eslint-disable-next-line no-console
    console.log(`[done] ${path} -> ${res.status} ${res.url} ${new TextDecoder().decode(res.body)}`);
  }
  await transport.close();
}

main().catch((e) => {
  // eslint-disable-next-line no-console
  console.error(e);
  process.exit(1);
});
