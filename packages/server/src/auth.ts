import { timingSafeEqual } from "node:crypto";
import type { RequestHandler, Request, Response, NextFunction } from "express";

// Module augmentation — attach clientId to Express requests
declare global {
  namespace Express {
    interface Request {
      clientId?: string;
    }
  }
}

function keysMatch(candidate: string, known: string): boolean {
  const a = Buffer.from(candidate);
  const b = Buffer.from(known);
  return a.length === b.length && timingSafeEqual(a, b);
}

/** Client id for a presented key, or undefined when no key matches. */
export function resolveClient(
  apiKeys: Record<string, string>,
  presented: string,
): string | undefined {
  for (const [key, clientId] of Object.entries(apiKeys)) {
    if (keysMatch(presented, key)) return clientId;
  }
  return undefined;
}

/** Bearer-token check against the API_KEYS map. */
export function createAuthMiddleware(
  apiKeys: Record<string, string>,
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const authHeader = req.headers.authorization;
    if (!authHeader) {
      res.status(401).json({ error: "Missing Authorization header" });
      return;
    }

    const [scheme, key, ...rest] = authHeader.split(" ");
    if (scheme !== "Bearer" || !key || rest.length > 0) {
      res.status(401).json({
        error: "Invalid Authorization format. Expected: Bearer <key>",
      });
      return;
    }

    const clientId = resolveClient(apiKeys, key);
    if (!clientId) {
      res.status(401).json({ error: "Invalid API key" });
      return;
    }

    req.clientId = clientId;
    next();
  };
}
