import { Request, Response, NextFunction, RequestHandler } from "express";
import logger from "../utils/logger";

/**
 * Bearer-token guard for the protected routes. Without a configured key
 * every protected request is refused.
 */
export function createAuthMiddleware(
  expectedToken: string | undefined,
): RequestHandler {
  if (!expectedToken) {
    logger.error("SERVER_API_KEY not configured; protected routes disabled");
    return (req: Request, res: Response): void => {
      res.status(500).json({ error: "Server configuration error" });
    };
  }

  const expectedHeader = `Bearer ${expectedToken}`;

  return (req: Request, res: Response, next: NextFunction): void => {
    const authHeader = req.headers.authorization;

    if (!authHeader?.startsWith("Bearer ")) {
      logger.warn(
        "Authentication failed: missing or invalid authorization header",
      );
      res.status(401).json({
        error: "Unauthorized: missing or invalid authorization header",
      });
      return;
    }

    if (authHeader !== expectedHeader) {
      logger.warn("Authentication failed: invalid API key");
      res.status(401).json({ error: "Unauthorized: invalid API key" });
      return;
    }

    next();
  };
}
