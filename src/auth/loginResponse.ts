export interface LoginResult {
  success: boolean;
  redirectUrl?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Reads `{ success, data: { cookie_redirect } }` from the login endpoint's JSON body. */
export function parseLoginResponse(body: unknown): LoginResult {
  if (!isRecord(body) || body.success !== true) {
    return { success: false };
  }

  const data = body.data;
  const redirect = isRecord(data) ? data.cookie_redirect : undefined;
  return {
    success: true,
    redirectUrl: typeof redirect === "string" && redirect.length > 0 ? redirect : undefined,
  };
}
