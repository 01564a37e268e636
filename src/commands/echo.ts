/**
 * `linewire echo`: Write every received message back unchanged until EOF.
 */
import { toError } from "../sdk/errors.js";
import type { LogStream } from "../sdk/logger.js";
import type { Transport } from "../sdk/transport/transport.js";

/** Returns the process exit code: 0 on EOF, 1 on failure. */
export async function runEcho(
  transport: Transport,
  stderr: LogStream = process.stderr,
): Promise<number> {
  try {
    await transport.connect();
    for await (const message of transport.receive()) {
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
