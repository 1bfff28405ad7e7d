import { timingSafeEqual } from 'crypto';
import type { NextFunction, Request, Response } from 'express';
import { AppError, NotFoundError, ValidationError, errorMessage } from '../lib/errors.js';
import type { Logger } from '../lib/logger.js';
import type { AuthService } from '../services/auth.service.js';
import { parseFamily } from '../services/complaint.service.js';
import type { ComplaintFilters, Family, SessionUser } from '../types/index.js';

/** Maps any thrown value onto the `{ success: false, error }` envelope. */
export function sendError(res: Response, err: unknown, log: Logger): void {
  if (err instanceof AppError) {
    if (err.status >= 500) log.error(err.message, err, { code: err.code });
    res.status(err.status).json({ success: false, error: err.message });
    return;
  }
  log.error('Unhandled error', err);
  res.status(500).json({ success: false, error: errorMessage(err) });
}

export function queryString(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (Array.isArray(value) && typeof value[0] === 'string') return value[0];
  return undefined;
}

export function bearerToken(req: Request): string | undefined {
  const header = req.headers.authorization || '';
  const match = /^Bearer\s+(.+)$/i.exec(header);
  return match?.[1]?.trim() || queryString(req.query.token);
}

export function sessionUser(res: Response): SessionUser | null {
  const user: unknown = res.locals.user;
  if (user && typeof user === 'object' && 'username' in user && 'userId' in user) {
    return {
      userId: Number(user.userId),
      username: String(user.username),
      fullName: 'fullName' in user ? String(user.fullName) : String(user.username),
      role: 'role' in user ? String(user.role) : 'operator',
    };
  }
  return null;
}

export function actorOf(res: Response): string | undefined {
  return sessionUser(res)?.username;
}

export function requireSession(auth: AuthService) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const user = auth.authenticate(bearerToken(req));
    if (!user) {
      res.status(401).json({ success: false, error: 'Authentication required' });
      return;
    }
    res.locals.user = user;
    next();
  };
}

export function secretMatches(expected: string, given: string | undefined): boolean {
  if (!given) return false;
  const a = Buffer.from(expected);
  const b = Buffer.from(given);
  return a.length === b.length && timingSafeEqual(a, b);
}

// Operator session, or the sibling node presenting the shared sync secret
export function requireSessionOrSecret(auth: AuthService, syncSecret: string) {
  const session = requireSession(auth);
  return (req: Request, res: Response, next: NextFunction): void => {
    if (syncSecret && secretMatches(syncSecret, req.header('x-sync-secret'))) {
      next();
      return;
    }
    session(req, res, next);
  };
}

export function familyParam(req: Request): Family {
  const family = parseFamily(req.params.family);
  if (!family) throw new NotFoundError(`Unknown complaint type: ${req.params.family ?? ''}`);
  return family;
}

export function idParam(req: Request): number {
  const raw = req.params.id ?? '';
  const id = /^\d+$/.test(raw) ? Number(raw) : Number.NaN;
  if (!Number.isSafeInteger(id) || id < 1) throw new ValidationError('Invalid record id');
  return id;
}

// Dashboard filter names as the frontend sends them
export function filtersFromQuery(query: Request['query']): ComplaintFilters {
  const includeHidden = (queryString(query.include_hidden) || '').toLowerCase();
  return {
    status: queryString(query.status),
    priority: queryString(query.priority),
    issueType: queryString(query.type),
    search: queryString(query.search),
    dateFrom: queryString(query.date_from),
    dateTo: queryString(query.date_to),
    timeFrom: queryString(query.time_from),
    timeTo: queryString(query.time_to),
    includeHidden: includeHidden === 'true' || includeHidden === '1',
  };
}
