import { DecodeError, HttpRequest } from '@declarest/http-api';
import { JsonDecoder } from '../Decoder';
import { responseFor } from './fakes';

describe('JsonDecoder', () => {
    const decoder = new JsonDecoder();
    const request = new HttpRequest('GET', 'http://h/items/1', new Map());

    it('should parse JSON bodies', () => {
        expect(decoder.decode(responseFor(request, 200, '{"id":"1","tags":["a"]}'))).toEqual({ id: '1', tags: ['a'] });
    });

    it('should give undefined for 204 and empty bodies', () => {
        expect(decoder.decode(responseFor(request, 204, 'ignored'))).toBeUndefined();
        expect(decoder.decode(responseFor(request, 200, ''))).toBeUndefined();
    });

    it('should keep the raw text for String', () => {
        expect(decoder.decode(responseFor(request, 200, 'OK'), String)).toBe('OK');
    });

    it('should throw DecodeError for malformed JSON', () => {
        let caught: unknown;
        try {
            decoder.decode(responseFor(request, 200, 'not json'));
        } catch (err: unknown) {
            caught = err;
        }

        expect(caught).toBeInstanceOf(DecodeError);
        expect(caught instanceof DecodeError && caught.message).toMatch(
            /^Could not read response of GET http:\/\/h\/items\/1 as JSON: /,
        );
        expect(caught instanceof DecodeError && caught.cause).toBeInstanceOf(SyntaxError);
    });
});
