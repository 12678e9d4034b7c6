import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
  extractJsonObject,
  hasMalformedEncoding,
  parseJsonResponse,
  repairJson,
  stripCodeFences,
} from '../json-response';

const Schema = z.object({ name: z.string(), count: z.number() });

describe('stripCodeFences', () => {
  it('removes a language-tagged fence', () => {
    expect(stripCodeFences('```json\n{"a":1}\n```')).toBe('{"a":1}');
  });

  it('leaves unfenced text alone apart from trimming', () => {
    expect(stripCodeFences('  {"a":1}  ')).toBe('{"a":1}');
  });
});

describe('repairJson', () => {
  it('drops trailing commas', () => {
    expect(repairJson('{"a":[1,2,],}')).toBe('{"a":[1,2]}');
  });

  it('replaces raw newlines inside strings', () => {
    expect(repairJson('{"a":"line one\nline two"}')).toBe('{"a":"line one line two"}');
  });
});

describe('extractJsonObject', () => {
  it('finds the outermost object in surrounding prose', () => {
    expect(extractJsonObject('Sure! {"a":{"b":1}} Hope that helps.')).toBe('{"a":{"b":1}}');
  });

  it('returns null without braces', () => {
    expect(extractJsonObject('no json here')).toBeNull();
  });
});

describe('parseJsonResponse', () => {
  it('validates a clean response', () => {
    expect(parseJsonResponse('{"name":"x","count":2}', Schema)).toEqual({ success: true, data: { name: 'x', count: 2 } });
  });

  it('repairs before giving up', () => {
    expect(parseJsonResponse('```\n{"name":"x","count":2,}\n```', Schema)).toEqual({
      success: true,
      data: { name: 'x', count: 2 },
    });
  });

  it('reports missing JSON, invalid JSON and schema mismatches', () => {
    expect(parseJsonResponse('nothing', Schema)).toEqual({ success: false, error: 'No JSON object found in response' });

    const invalid = parseJsonResponse('{name: x}', Schema);
    expect(invalid.success).toBe(false);
    expect(!invalid.success && invalid.error.startsWith('Invalid JSON: ')).toBe(true);

    const mismatch = parseJsonResponse('{"name":"x","count":"two"}', Schema);
    expect(!mismatch.success && mismatch.error.startsWith('Schema mismatch at count: ')).toBe(true);
  });
});

describe('hasMalformedEncoding', () => {
  it('detects replacement characters and lone surrogates', () => {
    expect(hasMalformedEncoding('ok \uFFFD')).toBe(true);
    expect(hasMalformedEncoding('bad \uD800 half')).toBe(true);
    expect(hasMalformedEncoding('bad \uDC00 half')).toBe(true);
  });

  it('accepts ordinary text including valid surrogate pairs', () => {
    expect(hasMalformedEncoding('Café 😀')).toBe(false);
  });
});
