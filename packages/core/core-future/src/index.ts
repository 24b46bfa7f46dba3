/**
 * @declarest/core-future
 *
 * Cancellable futures that carry the call context across callbacks.
 *
 * @packageDocumentation
 */

export { XFuture, CancellationError } from './XFuture';
