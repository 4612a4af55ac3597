import type { StreamEvent } from "../types.js";
import { errorMessage, type Logger } from "./logger.js";

export function toSseFrame(event: StreamEvent): string {
  return `data: ${JSON.stringify(event)}\n\n`;
}

// A fault after the stream has started is reported as a final error event; the HTTP status is already sent.
export async function* toServerSentEvents(events: AsyncIterable<StreamEvent>, logger: Logger): AsyncGenerator<string> {
  try {
    for await (const event of events) {
      yield toSseFrame(event);
    }
  } catch (error) {
    logger.error({ err: errorMessage(error) }, "query stream failed");
    yield toSseFrame({ status: "error", message: errorMessage(error) });
  }
}
