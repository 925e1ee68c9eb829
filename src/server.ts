/**
 * HTTP Server
 * Express boundary for typosquatting sweeps, evidence scoring and report generation
 */

import express, { NextFunction, Request, Response } from 'express';
import { Server } from 'node:http';
import { engineLogger } from './lib/logger.js';
import { config } from './lib/config.js';
import {
  generateCorrelationId,
  getCorrelationContext,
  runWithCorrelation,
  setProcessingStage,
  summarizeCorrelation,
} from './lib/correlation.js';
import { ValidationError } from './lib/errors.js';
import { DomainRequestSchema, safeParse } from './lib/schemas.js';
import { BrandProtectionAgent } from './agents/brand-protection-agent.js';

export interface HttpServerOptions {
  port: number;
  environment: string;
  apiKey?: string;
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

const CORRELATION_HEADER = 'x-correlation-id';
const CORRELATION_ID_PATTERN = /^[A-Za-z0-9._-]{1,128}$/;

const RATE_LIMIT_WINDOW_MS = 60 * 1000;
const RATE_LIMIT_MAX_REQUESTS = 60;

function isBodyParseError(err: unknown): boolean {
  return err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';
}

/** Errors raised with a 4xx status, such as body-parser's size and encoding rejections */
function isClientError(err: unknown): err is Error & { status: number } {
  return err instanceof Error && 'status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500;
}

export class HttpServer {
  private app: express.Application;
  private server?: Server;
  private rateLimitBuckets: Map<string, { count: number; resetAt: number }> = new Map();

  constructor(
    private agent: BrandProtectionAgent,
    private options: HttpServerOptions = config.server
  ) {
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
    this.app.use(this.handleError.bind(this));
  }

  /**
   * Setup middleware
   */
  private setupMiddleware(): void {
    // Body parsing resumes outside the async context, so correlation starts after it
    this.app.use(express.json({ limit: '1mb' }));
    this.app.use(this.withCorrelation.bind(this));
    this.app.use((req, res, next) => {
      engineLogger.debug('HTTP request', {
        method: req.method,
        path: req.path,
        ip: req.ip,
      });
      next();
    });
  }

  /**
   * Setup routes
   */
  private setupRoutes(): void {
    const apiRouter = express.Router();
    apiRouter.use(this.authenticateRequest.bind(this));
    apiRouter.use(this.rateLimit.bind(this));

    apiRouter.post('/typosquatting', this.route(this.handleTyposquatting));
    apiRouter.post('/domains/intel', this.route(this.handleDomainIntel));
    apiRouter.post('/evidence/score', this.route(this.handleScore));
    apiRouter.post('/reports/brand', this.route(this.handleBrandReport));
    apiRouter.post('/reports/dmca', this.route(this.handleDmcaNotice));

    this.app.use('/api', apiRouter);
    this.app.get('/health', this.handleHealth.bind(this));
    this.app.get('/', this.handleRoot.bind(this));
  }

  /** Forward rejected handlers to the error middleware */
  private route(handler: AsyncHandler) {
    return (req: Request, res: Response, next: NextFunction): void => {
      handler.call(this, req, res).catch(next);
    };
  }

  /**
   * Run each request in its own correlation context, echoing the ID back
   */
  private withCorrelation(req: Request, res: Response, next: NextFunction): void {
    const supplied = req.get(CORRELATION_HEADER);
    const correlationId = supplied && CORRELATION_ID_PATTERN.test(supplied) ? supplied : generateCorrelationId();
    res.setHeader(CORRELATION_HEADER, correlationId);
    runWithCorrelation(correlationId, () => {
      const context = getCorrelationContext();
      // 'finish' fires outside the async context, so the context is captured here
      res.on('finish', () => {
        if (!context) return;
        engineLogger.info('HTTP request completed', {
          method: req.method,
          path: req.path,
          status: res.statusCode,
          ...summarizeCorrelation(context),
        });
      });
      next();
    });
  }

  private async handleTyposquatting(req: Request, res: Response): Promise<void> {
    const { domain } = safeParse(DomainRequestSchema, req.body, 'typosquatting request');
    res.json(await this.agent.checkTyposquatting(domain));
  }

  private async handleDomainIntel(req: Request, res: Response): Promise<void> {
    const { domain, includeTyposquatting } = safeParse(DomainRequestSchema, req.body, 'domain intelligence request');
    const report = await this.agent.describeDomain(domain, { includeTyposquatting });
    res.json({ domain, report });
  }

  private async handleScore(req: Request, res: Response): Promise<void> {
    res.json(this.agent.scoreEvidence(req.body));
  }

  private async handleBrandReport(req: Request, res: Response): Promise<void> {
    const { caseId, filename, content, tier, overallScore } = this.agent.generateBrandReport(req.body);
    res.status(201).json({ caseId, filename, content, tier, overallScore });
  }

  private async handleDmcaNotice(req: Request, res: Response): Promise<void> {
    const { filename, content } = this.agent.generateDmcaNotice(req.body);
    res.status(201).json({ filename, content });
  }

  /**
   * Handle health check
   */
  private handleHealth(req: Request, res: Response): void {
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      ...this.agent.getHealth(),
      performance: engineLogger.summarizePerformance(),
    });
  }

  /**
   * Handle root
   */
  private handleRoot(req: Request, res: Response): void {
    res.json({
      name: 'Brand Evidence Engine',
      version: '1.0.0',
      status: 'running',
    });
  }

  /**
   * Map validation failures to 400 and anything else to an opaque 500
   */
  private handleError(err: unknown, req: Request, res: Response, _next: NextFunction): void {
    setProcessingStage('rejected');

    if (err instanceof ValidationError) {
      engineLogger.warn('Request rejected', { path: req.path, error: err.message, issues: err.issues.length });
      res.status(400).json({ error: err.message, issues: err.issues });
      return;
    }

    if (isBodyParseError(err)) {
      res.status(400).json({ error: 'Malformed JSON body', issues: [] });
      return;
    }

    if (isClientError(err)) {
      engineLogger.warn('Request rejected', { path: req.path, status: err.status, error: err.message });
      res.status(err.status).json({ error: err.message, issues: [] });
      return;
    }

    engineLogger.error('Request failed', err);
    res.status(500).json({ error: 'Internal error' });
  }

  /**
   * Authentication middleware for API endpoints
   */
  private authenticateRequest(req: Request, res: Response, next: NextFunction): void {
    const apiKey = this.options.apiKey;
    const authHeader = req.get('authorization') ?? '';
    const headerToken = authHeader.startsWith('Bearer ') ? authHeader.slice(7) : undefined;
    const providedKey = headerToken ?? req.get('x-api-key');

    // Fail secure in production if no key configured
    if (!apiKey && this.options.environment === 'production') {
      engineLogger.error('API request blocked - missing API key configuration');
      res.status(503).json({ status: 'unavailable', message: 'API key not configured' });
      return;
    }

    if (apiKey && providedKey !== apiKey) {
      res.status(401).json({ status: 'unauthorized' });
      return;
    }

    next();
  }

  /**
   * Fixed-window rate limiting per client address
   */
  private rateLimit(req: Request, res: Response, next: NextFunction): void {
    const now = Date.now();
    const key = req.ip ?? 'unknown';

    const bucket = this.rateLimitBuckets.get(key) ?? { count: 0, resetAt: now + RATE_LIMIT_WINDOW_MS };

    if (now > bucket.resetAt) {
      bucket.count = 0;
      bucket.resetAt = now + RATE_LIMIT_WINDOW_MS;
    }

    bucket.count += 1;
    this.rateLimitBuckets.set(key, bucket);

    if (bucket.count > RATE_LIMIT_MAX_REQUESTS) {
      res.status(429).json({ status: 'rate_limited', retryAfterMs: bucket.resetAt - now });
      return;
    }

    next();
  }

  getApp(): express.Application {
    return this.app;
  }

  /**
   * Start server
   */
  async start(): Promise<void> {
    const port = this.options.port;

    return new Promise((resolve) => {
      this.server = this.app.listen(port, () => {
        engineLogger.info('HTTP server started', { port });
        resolve();
      });
    });
  }

  /**
   * Stop accepting connections
   */
  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;

    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
    this.server = undefined;
    engineLogger.info('HTTP server stopped');
  }
}
