/**
 * Unit tests for collection response decoding
 */

import { describe, it, expect } from 'vitest';
import { decodeJson, parseCollectionResponse } from '../../src/parse.js';
import { DecodeError } from '../../src/exceptions.js';
import { createMockLogger } from '../setup.js';

describe('parseCollectionResponse', () => {
  it('should extract id and name', () => {
    const logger = createMockLogger();

    const result = parseCollectionResponse('{"id":"abc123","name":"demo"}', logger);

    expect(result).toEqual({ id: 'abc123', name: 'demo' });
    expect(logger.error).not.toHaveBeenCalled();
  });

  it('should ignore unknown fields', () => {
    const result = parseCollectionResponse(
      '{"id":"1","name":"demo","metadata":{"hnsw:space":"cosine"},"tenant":"default"}',
      createMockLogger()
    );

    expect(result).toEqual({ id: '1', name: 'demo' });
  });

  it('should leave id unset when it is not a string', () => {
    const result = parseCollectionResponse('{"id":123,"name":"demo"}', createMockLogger());

    expect(result).toEqual({ name: 'demo' });
    expect(result.id).toBeUndefined();
  });

  it('should leave id unset when it is missing', () => {
    const result = parseCollectionResponse('{"name":"demo"}', createMockLogger());

    expect(result).toEqual({ name: 'demo' });
  });

  it('should leave name unset when it is null', () => {
    const result = parseCollectionResponse('{"id":"abc","name":null}', createMockLogger());

    expect(result).toEqual({ id: 'abc' });
  });

  it('should match keys case-sensitively', () => {
    const result = parseCollectionResponse('{"ID":"abc","Name":"demo"}', createMockLogger());

    expect(result).toEqual({});
  });

  it('should return an empty collection for non-object JSON without logging', () => {
    const logger = createMockLogger();

    expect(parseCollectionResponse('[{"id":"abc"}]', logger)).toEqual({});
    expect(parseCollectionResponse('"abc"', logger)).toEqual({});
    expect(parseCollectionResponse('null', logger)).toEqual({});
    expect(logger.error).not.toHaveBeenCalled();
  });

  it('should return an empty collection for an empty body and log the failure', () => {
    const logger = createMockLogger();

    const result = parseCollectionResponse('', logger);

    expect(result).toEqual({});
    expect(logger.error).toHaveBeenCalledTimes(1);
  });

  it('should return an empty collection for text that is not JSON', () => {
    const logger = createMockLogger();

    const result = parseCollectionResponse('not json', logger);

    expect(result).toEqual({});
    expect(result.id).toBeUndefined();
    expect(result.name).toBeUndefined();
    expect(logger.error).toHaveBeenCalledTimes(1);
  });

  it('should log the remaining text from the failing position', () => {
    const logger = createMockLogger();

    const result = parseCollectionResponse('{"id" "abc"}', logger);

    expect(result).toEqual({});
    expect(logger.error).toHaveBeenCalledWith('Error before: "abc"}');
  });

  it('should ignore text after a complete JSON value', () => {
    const logger = createMockLogger();

    const result = parseCollectionResponse('{"id":"abc","name":"demo"}\n junk', logger);

    expect(result).toEqual({ id: 'abc', name: 'demo' });
    expect(logger.error).not.toHaveBeenCalled();
  });

  it('should keep the last value of a duplicate key', () => {
    const result = parseCollectionResponse('{"id":"first","id":"second","name":"n"}', createMockLogger());

    expect(result).toEqual({ id: 'second', name: 'n' });
  });
});

describe('decodeJson', () => {
  it('should return parsed values', () => {
    expect(decodeJson('{"a":[1,2]}')).toEqual({ a: [1, 2] });
  });

  it('should decode the value before trailing text', () => {
    expect(decodeJson('{"id":"abc"} trailing')).toEqual({ id: 'abc' });
    expect(decodeJson('[1,2]  ]')).toEqual([1, 2]);
  });

  it('should throw DecodeError with the parser offset when reported', () => {
    let thrown: unknown;
    try {
      decodeJson('{"id" "abc"}');
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(DecodeError);
    expect(thrown).toMatchObject({ position: 6 });
  });

  it('should throw DecodeError for empty input', () => {
    expect(() => decodeJson('')).toThrow(DecodeError);
  });
});
