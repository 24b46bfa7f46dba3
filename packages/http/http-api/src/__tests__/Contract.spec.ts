import {
    ApiInterface,
    BodyTemplate,
    Get,
    Param,
    Path,
    Post,
    RequestHeaders,
    ResponseType,
    Url,
} from '../decorators';
import { DecoratorContract } from '../Contract';
import { ContractError } from '../errors';
import { IsoDateExpander } from '../expanders';
import { MethodMetadata } from '../MethodMetadata';

class User {
    name?: string;
}

@ApiInterface({ headers: ['Accept: application/json'] })
abstract class UserApiPrototype {
    @Get()
    @Path('/users/{id}')
    getUser(@Param('id') id: string): Promise<User> {
        throw new Error('Must be implemented');
    }

    @Post()
    @Path('/users')
    @RequestHeaders('Content-Type: application/json', 'Accept: text/plain')
    createUser(user: User): Promise<User> {
        throw new Error('Must be implemented');
    }

    @Post()
    @Path('/login')
    login(@Param('username') username: string, @Param('password') password: string): Promise<void> {
        throw new Error('Must be implemented');
    }

    @Get()
    @Path('/search?q={q}&since={since}')
    @ResponseType(String)
    search(@Param('q') q: string, @Param('since', IsoDateExpander) since: Date): Promise<string> {
        throw new Error('Must be implemented');
    }

    @Get()
    @Path('/status')
    status(@Url() base: string): Promise<string> {
        throw new Error('Must be implemented');
    }

    @Post()
    @Path('/greet')
    @BodyTemplate('{{"name":"{name}"}')
    greet(@Param('name') name: string): Promise<void> {
        throw new Error('Must be implemented');
    }
}

function byName(all: MethodMetadata[], methodName: string): MethodMetadata {
    const found = all.find((m) => m.methodName === methodName);
    if (!found) {
        throw new Error(`No metadata for ${methodName}`);
    }
    return found;
}

describe('DecoratorContract', () => {
    const contract = new DecoratorContract();

    describe('parse', () => {
        const metadata = contract.parse(UserApiPrototype);

        it('should return one entry per method in declaration order', () => {
            expect(metadata.map((m) => m.methodName)).toEqual([
                'getUser',
                'createUser',
                'login',
                'search',
                'status',
                'greet',
            ]);
        });

        it('should build config keys from the parameter types', () => {
            expect(byName(metadata, 'getUser').configKey).toBe('UserApiPrototype#getUser(String)');
            expect(byName(metadata, 'createUser').configKey).toBe('UserApiPrototype#createUser(User)');
            expect(byName(metadata, 'search').configKey).toBe('UserApiPrototype#search(String,Date)');
        });

        it('should bind named parameters to template variables', () => {
            const getUser = byName(metadata, 'getUser');
            expect(getUser.template.getMethod()).toBe('GET');
            expect(getUser.template.url()).toBe('/users/{id}');
            expect(getUser.indexToName.get(0)).toEqual(['id']);
            expect(getUser.formParams).toEqual([]);
            expect(getUser.bodyIndex).toBeUndefined();
        });

        it('should apply api headers and let method headers replace them', () => {
            expect(byName(metadata, 'getUser').template.headers().get('Accept')).toEqual(['application/json']);

            const createUser = byName(metadata, 'createUser');
            expect(createUser.template.headers().get('Accept')).toEqual(['text/plain']);
            expect(createUser.template.headers().get('Content-Type')).toEqual(['application/json']);
        });

        it('should treat an undecorated parameter as the body', () => {
            const createUser = byName(metadata, 'createUser');
            expect(createUser.bodyIndex).toBe(0);
            expect(createUser.bodyType).toBe(User);
        });

        it('should make parameters unused by url, query and headers form fields', () => {
            expect(byName(metadata, 'login').formParams).toEqual(['username', 'password']);
        });

        it('should record expanders, queries and the response type', () => {
            const search = byName(metadata, 'search');
            expect(search.indexToExpanderClass.get(1)).toBe(IsoDateExpander);
            expect(search.template.queries().get('since')).toEqual(['{since}']);
            expect(search.returnType).toBe(String);
            expect(search.formParams).toEqual([]);
        });

        it('should record the url parameter index', () => {
            const status = byName(metadata, 'status');
            expect(status.urlIndex).toBe(0);
            expect(status.indexToName.size).toBe(0);
        });

        it('should keep body-template parameters as form fields without a body index', () => {
            const greet = byName(metadata, 'greet');
            expect(greet.template.getBodyTemplate()).toBe('{{"name":"{name}"}');
            expect(greet.formParams).toEqual(['name']);
            expect(greet.bodyIndex).toBeUndefined();
        });

        it('should freeze the metadata', () => {
            expect(Object.isFrozen(byName(metadata, 'login'))).toBe(true);
            expect(Object.isFrozen(byName(metadata, 'login').formParams)).toBe(true);
        });

        it('should be deterministic for the same type', () => {
            const again = contract.parse(UserApiPrototype);
            expect(again.map((m) => m.configKey)).toEqual(metadata.map((m) => m.configKey));
        });
    });

    describe('errors', () => {
        it('should reject a class without @ApiInterface', () => {
            abstract class PlainApi {
                @Get()
                @Path('/x')
                x(): Promise<void> {
                    throw new Error('Must be implemented');
                }
            }

            expect(() => contract.parse(PlainApi)).toThrow(
                new ContractError('Class PlainApi must be decorated with @ApiInterface()'),
            );
        });

        it('should reject method names reserved by generated clients', () => {
            @ApiInterface()
            abstract class ReservedApi {
                @Get()
                @Path('/x')
                hashCode(): Promise<number> {
                    throw new Error('Must be implemented');
                }
            }

            expect(() => contract.parse(ReservedApi)).toThrow(
                "Method name 'hashCode' on ReservedApi is reserved by generated clients",
            );
        });

        it('should reject a method without an HTTP method', () => {
            @ApiInterface()
            abstract class NoVerbApi {
                @Path('/x')
                x(): Promise<void> {
                    throw new Error('Must be implemented');
                }
            }

            expect(() => contract.parse(NoVerbApi)).toThrow(ContractError);
        });

        it('should reject a method without any decorator', () => {
            @ApiInterface()
            abstract class HalfDecoratedApi {
                @Get()
                @Path('/x/{id}')
                get(@Param('id') id: string): Promise<void> {
                    throw new Error('Must be implemented');
                }

                other(id: string): Promise<void> {
                    throw new Error('Must be implemented');
                }
            }

            expect(() => contract.parse(HalfDecoratedApi)).toThrow(
                new ContractError(
                    'Method HalfDecoratedApi.other is missing an HTTP method decorator such as @Get() or @Post()',
                ),
            );
        });

        it('should ignore accessors on the api class', () => {
            @ApiInterface()
            abstract class AccessorApi {
                get version(): string {
                    return 'v1';
                }

                @Get()
                @Path('/x')
                x(): Promise<void> {
                    throw new Error('Must be implemented');
                }
            }

            expect(contract.parse(AccessorApi).map((m) => m.methodName)).toEqual(['x']);
        });

        it('should reject two body parameters', () => {
            @ApiInterface()
            abstract class TwoBodiesApi {
                @Post()
                @Path('/x')
                x(a: User, b: User): Promise<void> {
                    throw new Error('Must be implemented');
                }
            }

            expect(() => contract.parse(TwoBodiesApi)).toThrow('Method TwoBodiesApi.x has too many body parameters');
        });

        it('should reject a body together with form parameters', () => {
            @ApiInterface()
            abstract class MixedApi {
                @Post()
                @Path('/x')
                x(@Param('name') name: string, body: User): Promise<void> {
                    throw new Error('Must be implemented');
                }
            }

            expect(() => contract.parse(MixedApi)).toThrow(
                'Method MixedApi.x mixes a body parameter with form parameters [name]',
            );
        });

        it('should reject a header without a colon', () => {
            @ApiInterface()
            abstract class BadHeaderApi {
                @Get()
                @Path('/x')
                @RequestHeaders('NoColon')
                x(): Promise<void> {
                    throw new Error('Must be implemented');
                }
            }

            expect(() => contract.parse(BadHeaderApi)).toThrow(
                "Header 'NoColon' on BadHeaderApi.x must be formatted as 'Name: value'",
            );
        });
    });
});
