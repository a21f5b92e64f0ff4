import crypto from "crypto";

export const WS_LOGIN_PATH = "/users/self/verify";

/**
 * OKX signature: base64(HMAC-SHA256(secret, timestamp + method + path + body)).
 */
export function signOkx(
  secretKey: string,
  timestamp: string,
  method: string,
  path: string,
  body = ""
): string {
  return crypto
    .createHmac("sha256", secretKey)
    .update(`${timestamp}${method.toUpperCase()}${path}${body}`)
    .digest("base64");
}

/** WebSocket login uses a millisecond timestamp and a fixed GET path. */
export function signWsLogin(secretKey: string, timestampMs: string): string {
  return signOkx(secretKey, timestampMs, "GET", WS_LOGIN_PATH);
}
