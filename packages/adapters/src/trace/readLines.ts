import type { Readable } from "node:stream";
import { createInterface } from "node:readline";

/**
 * Iterate the lines of a readable stream. An error emitted by the stream
 * ends the iteration and is rethrown to the consumer.
 */
export async function* readLines(input: Readable): AsyncGenerator<string> {
  const rl = createInterface({ input, crlfDelay: Infinity });
  const state: { error: Error | null } = { error: null };
  const onError = (err: Error) => {
    state.error = err;
    rl.close();
  };
  input.on("error", onError);

  try {
    for await (const line of rl) {
      yield line;
    }
  } finally {
    input.off("error", onError);
    rl.close();
  }

  if (state.error) {
    throw state.error;
  }
}
