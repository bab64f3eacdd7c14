/**
 * CORS
 *
 * `*` in the allow-list answers any origin with a wildcard; otherwise a
 * listed origin is reflected and unlisted origins get no CORS headers.
 */

const ALLOWED_METHODS = 'GET, POST, OPTIONS';
const ALLOWED_HEADERS = 'Content-Type, Authorization, X-Request-ID';
const PREFLIGHT_MAX_AGE = '600';

export function corsHeaders(origin: string | null, allowedOrigins: readonly string[]): Record<string, string> {
  if (allowedOrigins.includes('*')) {
    return { 'Access-Control-Allow-Origin': '*' };
  }
  if (origin && allowedOrigins.includes(origin)) {
    return { 'Access-Control-Allow-Origin': origin, Vary: 'Origin' };
  }
  return {};
}

export function handlePreflight(request: Request, allowedOrigins: readonly string[]): Response {
  const headers = corsHeaders(request.headers.get('Origin'), allowedOrigins);
  if (headers['Access-Control-Allow-Origin']) {
    headers['Access-Control-Allow-Methods'] = ALLOWED_METHODS;
    headers['Access-Control-Allow-Headers'] = ALLOWED_HEADERS;
    headers['Access-Control-Max-Age'] = PREFLIGHT_MAX_AGE;
  }
  return new Response(null, { status: 204, headers });
}

/** Copy of the response with CORS headers for the request's origin */
export function withCors(response: Response, request: Request, allowedOrigins: readonly string[]): Response {
  const headers = corsHeaders(request.headers.get('Origin'), allowedOrigins);
  if (Object.keys(headers).length === 0) {
    return response;
  }
  const newResponse = new Response(response.body, response);
  for (const [name, value] of Object.entries(headers)) {
    newResponse.headers.set(name, value);
  }
  return newResponse;
}
