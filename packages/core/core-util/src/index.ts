/**
 * @declarest/core-util
 *
 * Utility functions shared by every declarest package.
 *
 * @packageDocumentation
 */

export { toError } from './lib/errorUtils';
export { PreconditionError, checkArgument, checkNotNull } from './lib/preconditions';
export { Equatable, valueEquals, listEquals, hashString } from './lib/equality';
export { Header } from './Header';
