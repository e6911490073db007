import jwt from "jsonwebtoken";

export interface TokenOptions {
  secret: string;
  ttlSeconds: number;
}

export function signAuthToken(subject: string, options: TokenOptions): string {
  return jwt.sign({ sub: subject }, options.secret, {
    algorithm: "HS256",
    expiresIn: options.ttlSeconds,
  });
}

/** Subject of a valid, unexpired token; null for anything else. */
export function verifyAuthToken(token: string, secret: string): string | null {
  try {
    const payload = jwt.verify(token, secret, { algorithms: ["HS256"] });
    if (typeof payload === "object" && typeof payload.sub === "string") {
      return payload.sub;
    }
    return null;
  } catch {
    return null;
  }
}
