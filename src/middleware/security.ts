import helmet from 'helmet';

/**
 * Security headers for the JSON tool API. Nothing is rendered, so the CSP
 * forbids every content source.
 */
export const securityMiddleware = [
  helmet({
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'none'"],
        frameAncestors: ["'none'"],
      },
    },
    crossOriginResourcePolicy: { policy: 'same-origin' },
  }),
];
