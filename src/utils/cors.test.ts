import { describe, it, expect } from 'vitest';
import { corsHeaders, handlePreflight, withCors } from './cors';

function requestFrom(origin?: string, method = 'GET'): Request {
  const headers: Record<string, string> = {};
  if (origin) {
    headers.Origin = origin;
  }
  return new Request('http://localhost/api/generate/chart', { method, headers });
}

describe('corsHeaders', () => {
  it('should answer any origin with a wildcard', () => {
    expect(corsHeaders('https://app.test', ['*'])).toEqual({ 'Access-Control-Allow-Origin': '*' });
  });

  it('should reflect a listed origin', () => {
    expect(corsHeaders('https://app.test', ['https://app.test', 'https://admin.test'])).toEqual({
      'Access-Control-Allow-Origin': 'https://app.test',
      Vary: 'Origin',
    });
  });

  it('should give an unlisted origin nothing', () => {
    expect(corsHeaders('https://evil.test', ['https://app.test'])).toEqual({});
    expect(corsHeaders(null, ['https://app.test'])).toEqual({});
  });
});

describe('handlePreflight', () => {
  it('should return 204 with the allowed methods', () => {
    const response = handlePreflight(requestFrom('https://app.test', 'OPTIONS'), ['https://app.test']);

    expect(response.status).toBe(204);
    expect(response.headers.get('Access-Control-Allow-Origin')).toBe('https://app.test');
    expect(response.headers.get('Access-Control-Allow-Methods')).toBe('GET, POST, OPTIONS');
    expect(response.headers.get('Access-Control-Max-Age')).toBe('600');
  });

  it('should not advertise methods to an unlisted origin', () => {
    const response = handlePreflight(requestFrom('https://evil.test', 'OPTIONS'), ['https://app.test']);

    expect(response.status).toBe(204);
    expect(response.headers.get('Access-Control-Allow-Origin')).toBeNull();
    expect(response.headers.get('Access-Control-Allow-Methods')).toBeNull();
  });
});

describe('withCors', () => {
  it('should add headers and keep status and body', async () => {
    const original = new Response('{"ok":true}', { status: 201, headers: { 'Content-Type': 'application/json' } });

    const response = withCors(original, requestFrom('https://app.test'), ['*']);

    expect(response.status).toBe(201);
    expect(response.headers.get('Access-Control-Allow-Origin')).toBe('*');
    expect(response.headers.get('Content-Type')).toBe('application/json');
    expect(await response.text()).toBe('{"ok":true}');
  });

  it('should return the same response when no header applies', () => {
    const original = new Response('x');

    expect(withCors(original, requestFrom('https://evil.test'), ['https://app.test'])).toBe(original);
  });
});
