import { z } from "zod";
import { defineHandler, succeed } from "../handlerRegistry.js";

export const ECHO_TASK = "echo";

const EchoPayload = z.unknown();

// Diagnostics: proves the enqueue → claim → ack path end to end.
export const echoHandler = defineHandler(EchoPayload, async (payload, ctx) => {
  ctx.reportProgress({ stage: "echo", message: JSON.stringify(payload ?? null) });
  ctx.logger.debug(`echo task=${ctx.taskId}`, payload);
  return succeed();
});
