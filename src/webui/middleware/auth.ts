import { randomBytes, timingSafeEqual } from "node:crypto";
import type { MiddlewareHandler } from "hono";

export function generateToken(): string {
  return randomBytes(32).toString("base64url");
}

/** First and last four characters, for log output */
export function maskToken(token: string): string {
  if (token.length <= 8) return "****";
  return `${token.slice(0, 4)}...${token.slice(-4)}`;
}

function safeCompare(a: string, b: string): boolean {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  if (left.length !== right.length) return false;
  return timingSafeEqual(left, right);
}

/** Requires `Authorization: Bearer <token>` */
export function bearerAuth(getToken: () => string): MiddlewareHandler {
  return async (c, next) => {
    const header = c.req.header("Authorization");
    const match = header?.match(/^Bearer\s+(.+)$/i);
    if (match && safeCompare(match[1], getToken())) {
      return next();
    }
    return c.json({ success: false, error: "Unauthorized" }, 401);
  };
}
