import type { NextFunction, Request, Response } from 'express';
import type { SessionRegistry, WorkspaceSession } from '../modules/workspace/workspace.session.js';

export const SESSION_HEADER = 'x-session-id';
const SESSION_ID_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;

// Extend Express Request type to carry the caller's workspace session
export interface SessionRequest extends Request {
  workspace?: WorkspaceSession;
}

export function requireSession(req: SessionRequest): WorkspaceSession {
  if (!req.workspace) {
    throw new Error('Session middleware is not installed');
  }
  return req.workspace;
}

/**
 * Attach the workspace session named by the `X-Session-Id` header (default: `default`).
 */
export const createSessionMiddleware =
  (registry: SessionRegistry) => (req: SessionRequest, res: Response, next: NextFunction) => {
    const header = req.headers[SESSION_HEADER];
    const sessionId = typeof header === 'string' && header.length > 0 ? header : 'default';

    if (!SESSION_ID_PATTERN.test(sessionId)) {
      return res.status(400).json({
        success: false,
        error: 'Invalid session id',
        details: 'X-Session-Id must be 1-64 characters of letters, digits, "_" or "-"'
      });
    }

    req.workspace = registry.get(sessionId);
    next();
  };
