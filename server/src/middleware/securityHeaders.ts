import helmet from 'helmet';

/**
 * Headers for a JSON-only API: nothing may be framed, scripted or embedded.
 */
export function createSecurityHeaders(nodeEnv: string | undefined = process.env.NODE_ENV) {
  const isProduction = nodeEnv === 'production';
  return helmet({
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'none'"],
        frameAncestors: ["'none'"],
        baseUri: ["'none'"],
        formAction: ["'none'"],
      },
    },
    frameguard: { action: 'deny' },
    crossOriginEmbedderPolicy: false,
    hsts: isProduction ? { maxAge: 31536000, includeSubDomains: true } : false,
  });
}
