import { type IncomingHttpHeaders, createServer } from "node:http";
import { createApiHandler } from "./api/handlers";
import { config } from "./config";
import { createScanEngine } from "./scan/service";
import { createJobController, registerSchedules } from "./scheduler/jobs";

const toHeaders = (incoming: IncomingHttpHeaders): Headers => {
  const headers = new Headers();
  for (const [key, value] of Object.entries(incoming)) {
    for (const item of Array.isArray(value) ? value : value === undefined ? [] : [value]) {
      headers.append(key, item);
    }
  }
  return headers;
};

const main = async (): Promise<void> => {
  // Fail fast on a malformed ticker table or keyword file.
  const engine = await createScanEngine();
  console.log(`Loaded ${engine.index.symbols().length} tickers (strategy=${engine.scorer.strategy})`);

  const jobController = createJobController();
  const handle = createApiHandler(jobController);

  const server = createServer((req, res) => {
    const request = new Request(new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`), {
      method: req.method,
      headers: toHeaders(req.headers),
    });

    Promise.resolve(handle(request))
      .then(async (response) => {
        res.writeHead(response.status, Object.fromEntries(response.headers));
        res.end(Buffer.from(await response.arrayBuffer()));
      })
      .catch((error) => {
        console.error("Request handling failed", error);
        res.writeHead(500).end("Internal Server Error");
      });
  });

  server.listen(config.port);
  registerSchedules(jobController);

  const stop = (signal: string): void => {
    console.log(`${signal} received, stopping`);
    jobController
      .shutdown()
      .then(() => server.close(() => process.exit(0)))
      .catch((error) => {
        console.error("Shutdown failed", error);
        process.exit(1);
      });
  };
  process.once("SIGINT", () => stop("SIGINT"));
  process.once("SIGTERM", () => stop("SIGTERM"));

  console.log(`Server running on port ${config.port}. Cron job scheduled (${config.scanSchedule}, ${config.scheduleTimezone}).`);
};

main().catch((error) => {
  console.error("Server startup failed:", error);
  process.exit(1);
});
