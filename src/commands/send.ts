/**
 * `linewire send <messages..>`: Write each argument as one frame, then exit.
 */
import { toError } from "../sdk/errors.js";
import type { LogStream } from "../sdk/logger.js";
import type { Transport } from "../sdk/transport/transport.js";

export async function runSend(
  transport: Transport,
  messages: string[],
  stderr: LogStream = process.stderr,
): Promise<number> {
  try {
    await transport.connect();
    for (const message of messages) {
      await transport.send(message);
    }
    return 0;
  } catch (err) {
    stderr.write(toError(err).message + "\n");
    return 1;
  } finally {
    await transport.disconnect();
  }
}
