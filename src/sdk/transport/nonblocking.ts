import { ConfigurationError, toError } from "../errors.js";
import type { FileDescriptor } from "./descriptor.js";

/**
 * Put each descriptor in non-blocking mode, in order.
 * The first failure rejects with a {@link ConfigurationError}.
 */
export async function configureNonBlocking(...descriptors: FileDescriptor[]): Promise<void> {
  for (const descriptor of descriptors) {
    try {
      await descriptor.setNonBlocking();
    } catch (err) {
      throw new ConfigurationError(descriptor.label, toError(err));
    }
  }
}
