/**
 * Header - Interface for HTTP header definitions.
 *
 * Lives in core-util (the lowest package) so that core-context can store header
 * values without depending on http-api, whose PlatformHeader implements it.
 */
export interface Header {
    /**
     * The HTTP header name (e.g. 'x-request-id'), also the key used in RequestContext.
     */
    getHeaderName(): string;
}
