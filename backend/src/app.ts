import express, { Express, Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import cookieParser from 'cookie-parser';
import rateLimit from 'express-rate-limit';
import { type AppConfig, getAllowedOrigins } from './config/env';
import type { CardRepository } from './repositories/card.repository';
import { CardService } from './services/card.service';
import { QuizService } from './services/quiz.service';
import { VocabLoaderService } from './services/vocab-loader.service';
import { AuthService } from './services/auth.service';
import type { SessionStore } from './services/session-store.service';
import { createErrorHandler, asyncHandler } from './middleware/errorHandler';
import { requestIdMiddleware } from './middleware/requestId';
import { createAuthMiddleware } from './middleware/auth';
import { createCsrfProtection } from './middleware/csrf';
import { HTTP_STATUS, HTTP_HEADERS, SECURITY_HEADERS } from './constants/http.constants';
import { createAuthRouter } from './routes/auth.routes';
import { createCardsRouter } from './routes/cards.routes';
import { createStatsRouter } from './routes/stats.routes';
import { createTopicsRouter } from './routes/topics.routes';
import { logger } from './utils/logger';

export interface AppDeps {
  config: AppConfig;
  cards: CardRepository;
  sessions: SessionStore;
}

const HOURS_MS = 60 * 60 * 1000;

export function createApp({ config, cards, sessions }: AppDeps): Express {
  const cardService = new CardService(cards);
  const quizService = new QuizService(cards);
  const vocabLoader = new VocabLoaderService(cards, config.VOCAB_DIR);
  const authService = new AuthService(sessions, {
    password: config.APP_PASSWORD,
    sessionTtlMs: config.SESSION_TTL_HOURS * HOURS_MS,
  });
  const allowedOrigins = getAllowedOrigins(config);

  const app = express();

  // Trust first proxy (e.g. nginx) so req.secure and req.ip reflect X-Forwarded-* and X-Real-IP
  app.set('trust proxy', 1);

  // Security headers
  app.use(helmet({
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'self'"],
        styleSrc: ["'self'"],
        scriptSrc: ["'self'"],
        imgSrc: ["'self'", "data:"],
        connectSrc: ["'self'"],
        fontSrc: ["'self'"],
        objectSrc: ["'none'"],
        frameSrc: ["'none'"],
        baseUri: ["'self'"],
        formAction: ["'self'"],
        upgradeInsecureRequests: config.NODE_ENV === 'production' ? [] : null,
      },
    },
    hsts: {
      maxAge: SECURITY_HEADERS.HSTS_MAX_AGE_SECONDS,
      includeSubDomains: SECURITY_HEADERS.HSTS_INCLUDE_SUBDOMAINS,
      preload: SECURITY_HEADERS.HSTS_PRELOAD,
    },
    xContentTypeOptions: true,
    xFrameOptions: { action: 'deny' },
    referrerPolicy: { policy: 'strict-origin-when-cross-origin' },
  }));

  // Request ID for tracing
  app.use(requestIdMiddleware);

  // CORS configuration
  app.use(cors({
    origin: (origin, callback) => {
      if (!origin) return callback(null, true);
      if (allowedOrigins.includes(origin)) return callback(null, true);
      callback(new Error('Not allowed by CORS'));
    },
    credentials: true,
    optionsSuccessStatus: HTTP_HEADERS.OPTIONS_SUCCESS_STATUS,
  }));

  // Rate limiting
  app.use('/api/', rateLimit({
    windowMs: config.RATE_LIMIT_WINDOW_MS,
    max: config.RATE_LIMIT_MAX,
    message: { success: false, error: 'Too many requests from this IP, please try again later.' },
    standardHeaders: true,
    legacyHeaders: false,
  }));

  // Stricter rate limit for login to mitigate password guessing
  app.use('/api/auth', rateLimit({
    windowMs: config.AUTH_RATE_LIMIT_WINDOW_MS,
    max: config.AUTH_RATE_LIMIT_MAX,
    message: { success: false, error: 'Too many auth attempts, please try again later.' },
    standardHeaders: true,
    legacyHeaders: false,
  }));

  // Cookie parsing (session_token httpOnly cookie)
  app.use(cookieParser());

  // Request logging
  morgan.token('request-id', (req: Request) => req.requestId ?? '-');
  app.use(morgan(':method :url :status :response-time ms req_id=:request-id', {
    skip: () => config.NODE_ENV === 'test',
  }));

  // Body parsing with size limits
  app.use(express.json({ limit: config.MAX_REQUEST_SIZE }));

  // Health check (no auth required)
  app.get('/health', asyncHandler(async (_req: Request, res: Response) => {
    const dbConnected = await cards.ping();

    return res.status(dbConnected ? HTTP_STATUS.OK : HTTP_STATUS.SERVICE_UNAVAILABLE).json({
      status: dbConnected ? 'healthy' : 'unhealthy',
      timestamp: new Date().toISOString(),
      service: 'vietnamese-flashcards-backend',
      database: dbConnected ? 'connected' : 'disconnected',
      driver: config.DATABASE_DRIVER,
      uptime: process.uptime(),
    });
  }));

  // Auth routes (no auth/CSRF required)
  app.use('/api/auth', createAuthRouter({ authService, config }));

  // API Routes (require a session when APP_PASSWORD is set, plus CSRF protection)
  const requireSession = createAuthMiddleware(authService);
  app.use('/api', createCsrfProtection(allowedOrigins));
  app.use('/api/cards', requireSession, createCardsRouter({ cardService, quizService }));
  app.use('/api/topics', requireSession, createTopicsRouter({ vocabLoader }));
  app.use(['/api/stats', '/api/categories'], requireSession);
  app.use('/api', createStatsRouter({ cardService }));

  // 404 handler
  app.use((req: Request, res: Response) => {
    return res.status(HTTP_STATUS.NOT_FOUND).json({
      success: false,
      error: 'Route not found',
      code: 'NOT_FOUND',
      requestId: req.requestId,
    });
  });

  // Global error handler (must be last)
  app.use(createErrorHandler(config));

  if (!authService.enabled) {
    logger.warn('APP_PASSWORD is not set; the API is open to anyone who can reach it');
  }

  return app;
}
