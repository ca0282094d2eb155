import type { Engine } from "@keyline/engine-core/src/engine";
import { createLogger } from "@keyline/engine-core/src/log";
import type { Port, TEngineRequest, TEngineResponse } from "./protocol";
import { EngineRequest, requestId } from "./protocol";

const log = createLogger("worker");

async function dispatch(engine: Engine, request: TEngineRequest): Promise<unknown> {
  switch (request.type) {
    case "key":
      return engine.applyChar(request.payload.char);
    case "backspace":
      engine.backspace();
      return engine.snapshot();
    case "snapshot":
      return engine.snapshot();
    case "letters":
      return engine.cleanLetters();
    case "profiles":
      return engine.listProfiles();
    case "select":
      return engine.selectProfile(request.payload.index);
    case "add_profile":
      return engine.addProfile(request.payload.name, request.payload.layout);
    case "save":
      await engine.save(request.payload.path);
      return null;
  }
}

/**
 * Makes `engine` the single owner behind `port`: requests are validated and
 * run strictly in arrival order, each answered with a response carrying the
 * request id. Returns a function that detaches the listener.
 */
export function serveEngine(port: Port, engine: Engine): () => void {
  let queue: Promise<void> = Promise.resolve();

  const respond = (response: TEngineResponse) => port.postMessage(response);

  const onMessage = (data: unknown) => {
    const parsed = EngineRequest.safeParse(data);
    if (!parsed.success) {
      log.warn("rejected malformed request", parsed.error.issues[0]?.message);
      respond({ id: requestId(data), ok: false, error: `malformed request: ${parsed.error.issues[0]?.message ?? "invalid"}` });
      return;
    }
    const request = parsed.data;
    queue = queue
      .then(() => dispatch(engine, request))
      .then((payload) => respond({ id: request.id, ok: true, payload }))
      .catch((err: unknown) => {
        const message = err instanceof Error ? err.message : "unknown error";
        log.error(`${request.type} failed: ${message}`);
        respond({ id: request.id, ok: false, error: message });
      });
  };

  port.on("message", onMessage);
  return () => {
    port.off("message", onMessage);
  };
}
