import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import cors from 'cors';
import { Request, Response, NextFunction, RequestHandler } from 'express';
import { config } from '../config';
import { AppError } from '../utils/errors';
import { getRequestIp } from './clientIp';

function isRequestFromBypassIP(req: Request): boolean {
  const clientIp = getRequestIp(req);

  return config.security.bypassIPs.some(bypassIp => {
    if (clientIp === bypassIp) return true;

    if (bypassIp === 'localhost') {
      return clientIp === '127.0.0.1' || clientIp === '::1';
    }

    return false;
  });
}

function conditionalMiddleware(middleware: RequestHandler): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!config.security.enableMiddleware || isRequestFromBypassIP(req)) {
      return next();
    }
    return middleware(req, res, next);
  };
}

// The front end loads its script and the map image from this origin only
export const helmetMiddleware = conditionalMiddleware(
  helmet({
    contentSecurityPolicy: config.isProduction
      ? {
          directives: {
            defaultSrc: ["'self'"],
            scriptSrc: ["'self'"],
            imgSrc: ["'self'", 'data:'],
          },
        }
      : false,
  })
);

// Rate limiting, keyed on the connection address (or the trusted proxy's view of it)
const rateLimiter = rateLimit({
  windowMs: config.rateLimit.windowMs,
  limit: config.rateLimit.maxRequests,
  standardHeaders: true,
  legacyHeaders: false,
  keyGenerator: (req: Request) => getRequestIp(req) || 'unknown',
  skip: (req: Request) => isRequestFromBypassIP(req),
  message: { status: 'error', statusCode: 429, error: 'Too many requests from this IP, please try again later.' },
});

export const rateLimitMiddleware = conditionalMiddleware(rateLimiter);

const corsOptions: cors.CorsOptions = {
  origin: (origin, callback) => {
    // Requests with no origin (curl, same-origin navigation)
    if (!origin) return callback(null, true);

    if (config.cors.allowedOrigins.includes('*') || config.cors.allowedOrigins.includes(origin)) {
      return callback(null, true);
    }

    callback(new AppError('Not allowed by CORS', 403));
  },
  methods: ['GET'],
  optionsSuccessStatus: 200,
};

export const corsMiddleware = conditionalMiddleware(cors(corsOptions));
