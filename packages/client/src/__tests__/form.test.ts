import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { apiPath, encodeForm, versionPath } from '../form.js';

describe('encodeForm', () => {
  it('should send only allow-listed fields, in allow-list order', () => {
    const body = encodeForm({ port: 80, name: 'origin', debug: 'yes' }, ['name', 'port']);

    expect(body.toString()).toBe('name=origin&port=80');
  });

  it('should omit null and undefined values instead of sending them empty', () => {
    const body = encodeForm({ name: 'origin', shield: undefined, comment: null }, [
      'name',
      'shield',
      'comment',
    ]);

    expect(body.toString()).toBe('name=origin');
  });

  it('should send booleans as 1 and 0', () => {
    const body = encodeForm({ use_ssl: true, auto_loadbalance: false }, [
      'use_ssl',
      'auto_loadbalance',
    ]);

    expect(body.toString()).toBe('use_ssl=1&auto_loadbalance=0');
  });

  it('should escape reserved characters', () => {
    expect(encodeForm({ statement: 'a b&c' }, ['statement']).toString()).toBe(
      'statement=a+b%26c'
    );
  });

  it('should keep empty strings', () => {
    expect(encodeForm({ comment: '' }, ['comment']).toString()).toBe('comment=');
  });

  it('should reject values that have no form encoding', () => {
    expect(() => encodeForm({ backends: ['a', 'b'] }, ['backends'])).toThrow(
      'Field "backends" cannot be form-encoded (got object)'
    );
  });

  it('should ignore inherited properties', () => {
    expect(encodeForm({}, ['constructor', 'toString']).toString()).toBe('');
  });

  it('should never transmit a key outside the allow-list', () => {
    fc.assert(
      fc.property(
        fc.dictionary(fc.string({ minLength: 1 }), fc.oneof(fc.string(), fc.integer(), fc.boolean())),
        fc.array(fc.string({ minLength: 1 })),
        (fields, allowList) => {
          const sent = new URLSearchParams(encodeForm(fields, allowList).toString());
          for (const key of sent.keys()) {
            expect(allowList).toContain(key);
          }
        }
      )
    );
  });

  it('should transmit every allow-listed string field verbatim', () => {
    fc.assert(
      fc.property(fc.dictionary(fc.string({ minLength: 1 }), fc.string()), (fields) => {
        const keys = Object.keys(fields);
        const sent = new URLSearchParams(encodeForm(fields, keys).toString());
        for (const key of keys) {
          expect(sent.get(key)).toBe(fields[key]);
        }
      })
    );
  });
});

describe('apiPath', () => {
  it('should join and encode segments', () => {
    expect(apiPath('service', 'svc 1', 'purge', 'a/b')).toBe('/service/svc%201/purge/a%2Fb');
  });

  it('should stringify numbers', () => {
    expect(apiPath('service', 'svc-1', 'version', 3)).toBe('/service/svc-1/version/3');
  });
});

describe('versionPath', () => {
  it('should build version-scoped paths', () => {
    expect(versionPath('svc-1', 2, 'backend', 'origin')).toBe(
      '/service/svc-1/version/2/backend/origin'
    );
    expect(versionPath('svc-1', 2)).toBe('/service/svc-1/version/2');
  });
});
