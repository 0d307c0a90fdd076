const WEAK_SECRETS = new Set(["changeme", "secret", "dev-secret", "123456", "password"]);
const MIN_SECRET_LENGTH = 32;

type Env = Record<string, string | undefined>;

export function isAuthDisabled(env: Env = process.env): boolean {
  return env.AUTH_DISABLED === "true" || env.NODE_ENV === "test";
}

export function validateSecurityConfig(env: Env = process.env): void {
  if (isAuthDisabled(env)) return;

  const secret = env.AUTH_JWT_SECRET?.trim();
  if (!secret) {
    throw new Error("Missing AUTH_JWT_SECRET. Set a strong secret (>= 32 chars) or AUTH_DISABLED=true for local-only runs.");
  }

  if (secret.length < MIN_SECRET_LENGTH) {
    throw new Error(`AUTH_JWT_SECRET is too short. Minimum length is ${MIN_SECRET_LENGTH} characters.`);
  }

  if (WEAK_SECRETS.has(secret.toLowerCase())) {
    throw new Error("AUTH_JWT_SECRET is weak. Use a high-entropy value.");
  }

  if (secret === env.AGENT_CONNECT_SECRET?.trim()) {
    throw new Error("AUTH_JWT_SECRET must differ from AGENT_CONNECT_SECRET.");
  }
}
