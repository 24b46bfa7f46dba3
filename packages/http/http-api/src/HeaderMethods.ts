import { ContextReader } from './ContextReader';
import { PlatformHeader } from './PlatformHeader';

/**
 * HeaderMethods - Stateless helpers for platform headers. Create with `new HeaderMethods()`.
 */
export class HeaderMethods {
    findTransferHeaders(headers: readonly PlatformHeader[]): PlatformHeader[] {
        return headers.filter((h) => h.isWantTransferred);
    }

    secureHeaders(headers: readonly PlatformHeader[]): PlatformHeader[] {
        return headers.filter((h) => h.isSecured);
    }

    /**
     * Values of the given headers from the reader, masked where secured.
     */
    buildSecureMapForLogs(platformHeaders: readonly PlatformHeader[], contextReader: ContextReader): Map<string, string> {
        const headers = new Map<string, string>();
        for (const header of platformHeaders) {
            const value = contextReader.read(header);
            if (value) {
                headers.set(header.headerName, header.isSecured ? this.maskSecureValue(value) : value);
            }
        }
        return headers;
    }

    /**
     * Request headers ready for a log line. Names matching a secured header
     * (case-insensitive) are masked; everything else is joined with `,`.
     */
    formatHeadersForLogging(
        secured: readonly PlatformHeader[],
        headers: ReadonlyMap<string, readonly string[]>,
    ): Record<string, string> {
        const securedNames = new Set(secured.filter((h) => h.isSecured).map((h) => h.headerName.toLowerCase()));
        const result: Record<string, string> = {};
        for (const [name, values] of headers) {
            if (values.length === 0) {
                continue;
            }
            result[name] = securedNames.has(name.toLowerCase())
                ? values.map((v) => this.maskSecureValue(v)).join(',')
                : values.join(',');
        }
        return result;
    }

    /**
     * - length > 15: first 3 + "..." + last 3
     * - length 8-15: first 2 + "..."
     * - length < 8: "<secure key too short to log>"
     */
    maskSecureValue(value: string): string {
        const len = value.length;
        if (len < 8) {
            return '<secure key too short to log>';
        } else if (len <= 15) {
            return `${value.substring(0, 2)}...`;
        }
        return `${value.substring(0, 3)}...${value.substring(len - 3)}`;
    }
}
