import { NextFunction, Request, RequestHandler, Response } from "express";
import { JwtPayload, TokenExpiredError, verify } from "jsonwebtoken";
import { z } from "zod";
import "../../types/express";
import { Principal } from "../../types/PrincipalInterface";
import { UserRoleEnum } from "../../types/enums/userRoleEnum";

const TokenPayloadSchema = z.object({
  id: z.string().min(1),
  role: z.nativeEnum(UserRoleEnum),
});

function deny(res: Response, message: string, code: string) {
  return res.status(401).json({ error: { message, code } });
}

function bearerToken(req: Request): string | undefined {
  const header = req.headers.authorization;
  if (!header || !header.startsWith("Bearer ")) return undefined;
  const token = header.slice("Bearer ".length).trim();
  return token || undefined;
}

/**
 * Verifies an HS256 bearer token carrying `{ id, role }`. The role is
 * trusted as issued; ownership rules are enforced by the services.
 */
export function createAuth(jwtSecret: string): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const token = bearerToken(req);
    if (!token) return deny(res, "Invalid Token. Access Denied!", "UNAUTHENTICATED");

    let decoded: string | JwtPayload;
    try {
      decoded = verify(token, jwtSecret, { algorithms: ["HS256"] });
    } catch (e) {
      if (e instanceof TokenExpiredError) return deny(res, "Token expired", "TOKEN_EXPIRED");
      return deny(res, "Invalid Token. Access Denied!", "UNAUTHENTICATED");
    }

    const payload = TokenPayloadSchema.safeParse(decoded);
    if (!payload.success) return deny(res, "Invalid Token. Access Denied!", "INVALID_TOKEN_PAYLOAD");

    req.principal = { id: payload.data.id, role: payload.data.role };
    return next();
  };
}

export function principalOf(req: Request): Principal {
  if (!req.principal) throw new Error("principalOf called on a route without the auth middleware");
  return req.principal;
}
