import { Request, Response, NextFunction } from "express";
import { createHash, timingSafeEqual } from "crypto";

// fixed-length digests so the comparison time doesn't leak the token length
const digest = (value: string) => createHash("sha256").update(value).digest();

export const tokenMatches = (presented: string, expected: string): boolean =>
  timingSafeEqual(digest(presented), digest(expected));

/**
 * Bearer-token guard. With no token configured every protected route
 * answers 503 rather than running open.
 */
export const verifyToken = (expected: string | undefined) => {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!expected) {
      return res.status(503).json({ message: "API token is not configured" });
    }

    const header = req.headers.authorization ?? "";
    const [scheme, token] = header.split(" ");
    if (scheme !== "Bearer" || !token || token.trim() === "") {
      return res.status(401).json({ message: "Token Not Received" });
    }
    if (!tokenMatches(token.trim(), expected)) {
      req.log.warn("Rejected request with invalid bearer token");
      return res.status(401).json({ message: "Invalid Token" });
    }

    return next();
  };
};
