import { ApiType } from '@declarest/http-api';
import { ClientBuilder } from './ClientBuilder';
import { ClientConfig } from './ClientConfig';
import { Client } from './ClientFactory';
import { HardCodedTarget } from './Target';

/**
 * Creates a type-safe client from an API prototype class.
 *
 * ```typescript
 * const client = createClient(UserApiPrototype, 'http://localhost:3000');
 * const user = await client.getUser('42');
 * ```
 *
 * For per-call headers, routing keys or async calls keep a ClientBuilder instead.
 */
export function createClient<T extends object>(
    apiPrototype: ApiType<T>,
    url: string,
    config: ClientConfig = ClientConfig.builder().build(),
): Client<T> {
    return new ClientBuilder(new HardCodedTarget(apiPrototype, url), config).client();
}
