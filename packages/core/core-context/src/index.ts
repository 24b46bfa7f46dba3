/**
 * @declarest/core-context
 *
 * Call-scoped context built on AsyncLocalStorage. Node.js only.
 *
 * @packageDocumentation
 */

export { Context, ContextKey, ContextStore } from './Context';
export { RequestContext } from './RequestContext';
