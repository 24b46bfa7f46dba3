import { FORM_MAP_TYPE, RequestTemplate } from '@declarest/http-api';
import { DefaultEncoder } from '../Encoder';

class Item {
    constructor(
        readonly id: string,
        readonly count: number,
    ) {}
}

describe('DefaultEncoder', () => {
    const encoder = new DefaultEncoder();

    function template(): RequestTemplate {
        return new RequestTemplate().method('POST').append('/x');
    }

    it('should write objects as JSON', () => {
        const t = template();
        encoder.encode(new Item('a1', 2), Item, t);

        expect(t.getBody()).toBe('{"id":"a1","count":2}');
        expect(t.headers().get('Content-Type')).toEqual(['application/json']);
    });

    it('should keep a Content-Type already on the template', () => {
        const t = template().header('content-type', 'application/vnd.items+json');
        encoder.encode({ id: 'a1' }, Object, t);

        expect(t.headers().get('content-type')).toEqual(['application/vnd.items+json']);
        expect(t.headers().has('Content-Type')).toBe(false);
    });

    it('should write strings as they are', () => {
        const t = template();
        encoder.encode('plain text', String, t);

        expect(t.getBody()).toBe('plain text');
        expect(t.headers().size).toBe(0);
    });

    it('should write bytes as octet-stream', () => {
        const bytes = new Uint8Array([1, 2, 3]);
        const t = template();
        encoder.encode(bytes, Uint8Array, t);

        expect(t.getBody()).toBe(bytes);
        expect(t.headers().get('Content-Type')).toEqual(['application/octet-stream']);
    });

    it('should form-encode a Map of fields', () => {
        const t = template();
        const fields = new Map<string, unknown>([
            ['username', 'bob smith'],
            ['password', 'test-secret'],
            ['roles', ['a', 'b']],
            ['missing', undefined],
        ]);
        encoder.encode(fields, FORM_MAP_TYPE, t);

        expect(t.getBody()).toBe('username=bob+smith&password=test-secret&roles=a&roles=b');
        expect(t.headers().get('Content-Type')).toEqual(['application/x-www-form-urlencoded; charset=UTF-8']);
    });

    it('should fail for values without a JSON form', () => {
        expect(() => encoder.encode(undefined, Object, template())).toThrow('Object value undefined has no JSON form');
    });

    it('should fail for values JSON cannot write', () => {
        const cyclic: Record<string, unknown> = {};
        cyclic.self = cyclic;

        expect(() => encoder.encode(cyclic, Item, template())).toThrow(/^Could not write Item as JSON: /);
    });
});
