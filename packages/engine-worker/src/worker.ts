import { parentPort, workerData } from "node:worker_threads";
import { z } from "zod";
import { Engine } from "@keyline/engine-core/src/engine";
import { EngineConfig } from "@keyline/engine-core/src/config";
import { createLogger } from "@keyline/engine-core/src/log";
import { serveEngine } from "./serve";

const log = createLogger("worker");

export const WorkerData = z.object({
  corpusPath: z.string(),
  profilesPath: z.string(),
  config: EngineConfig.optional()
});

// Thread entry: load both stores, then serve on the parent port.
if (parentPort) {
  const port = parentPort;
  const options = WorkerData.parse(workerData);
  Engine.load(options)
    .then((engine) => {
      serveEngine(port, engine);
      log.info("engine ready");
    })
    .catch((err: unknown) => {
      log.error("engine failed to load", err);
      process.exit(1);
    });
}
