import { Credentials } from "./types";

export class MissingCredentialsError extends Error {
  constructor(missing: string[]) {
    super(`Missing credentials: set ${missing.join(" and ")}`);
    this.name = "MissingCredentialsError";
  }
}

/** Reads the site login from the environment. Values are never logged or persisted. */
export function loadCredentials(env: NodeJS.ProcessEnv = process.env): Credentials {
  const username = env.TCTMD_USERNAME?.trim();
  const password = env.TCTMD_PASSWORD;
  const missing: string[] = [];
  if (!username) {
    missing.push("TCTMD_USERNAME");
  }
  if (!password) {
    missing.push("TCTMD_PASSWORD");
  }
  if (!username || !password) {
    throw new MissingCredentialsError(missing);
  }

  return Object.freeze({ username, password });
}
