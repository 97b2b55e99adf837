import { decodeKey, encodeKey, keyForItem } from '../src/core/batch/CorrelationCodec.js';
import { InvalidWorkItemError, MalformedKeyError } from '../src/core/errors.js';

describe('CorrelationCodec', () => {
  test('should join plain segments with slashes', () => {
    expect(encodeKey('docs', 'articles', '42', 'summarize')).toBe('docs/articles/42/summarize');
  });

  test('should escape separators and spaces inside segments', () => {
    const key = encodeKey('docs', 'articles', 'a/b c', 'summarize');
    expect(key).toBe('docs/articles/a%2Fb%20c/summarize');
    expect(decodeKey(key)).toEqual({
      namespace: 'docs',
      collection: 'articles',
      itemId: 'a/b c',
      processor: 'summarize',
    });
  });

  test('should recover identities with unicode and percent signs', () => {
    const identities = [
      { namespace: 'münchen', collection: 'straße', itemId: '100%', processor: 'tag' },
      { namespace: 'ns', collection: 'c', itemId: 'x?y=1&z=2', processor: 'embed' },
    ];
    for (const identity of identities) {
      expect(decodeKey(keyForItem(identity))).toEqual(identity);
    }
  });

  test('should reject empty segments when encoding', () => {
    expect(() => encodeKey('docs', '', '42', 'summarize')).toThrow(InvalidWorkItemError);
    expect(() => encodeKey('docs', 'articles', '42', '')).toThrow('Work item processor must not be empty');
  });

  describe('decodeKey', () => {
    test('should reject the wrong number of segments', () => {
      expect(() => decodeKey('docs/articles/42')).toThrow(MalformedKeyError);
      expect(() => decodeKey('docs/articles/42/summarize/extra')).toThrow('expected 4 segments, got 5');
    });

    test('should reject empty segments', () => {
      expect(() => decodeKey('docs//42/summarize')).toThrow('empty segment');
    });

    test('should reject invalid escapes', () => {
      expect(() => decodeKey('docs/articles/%zz/summarize')).toThrow(MalformedKeyError);
    });

    test('should reject escapes the encoder would never produce', () => {
      expect(() => decodeKey('docs/articles/%41/summarize')).toThrow('non-canonical segment "%41"');
    });

    test('should reject keys that are not correlation keys at all', () => {
      expect(() => decodeKey('request-1')).toThrow(MalformedKeyError);
    });
  });
});
