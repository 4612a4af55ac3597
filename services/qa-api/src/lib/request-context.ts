import type { FastifyRequest } from "fastify";

export type CredentialSource = "authorization" | "x-api-key";

export type RequestContext = {
  authSubject: "anonymous" | "api_key";
  credential: CredentialSource | null;
};

export type AuthFailure = "missing_api_token" | "invalid_api_token";

export type AuthResolution = { ok: true; context: RequestContext } | { ok: false; reason: AuthFailure };

type PresentedKey = {
  key: string;
  source: CredentialSource;
};

function headerValue(header: string | string[] | undefined): string {
  const raw = Array.isArray(header) ? header[0] : header;
  return raw?.trim() ?? "";
}

function presentedKey(request: FastifyRequest): PresentedKey | null {
  const match = /^bearer\s+(\S+)$/i.exec(headerValue(request.headers.authorization));
  if (match?.[1]) {
    return { key: match[1], source: "authorization" };
  }
  const apiKey = headerValue(request.headers["x-api-key"]);
  return apiKey ? { key: apiKey, source: "x-api-key" } : null;
}

// With no configured keys every caller is anonymous and allowed.
export function authorizeRequest(request: FastifyRequest, apiKeys: readonly string[]): AuthResolution {
  const presented = presentedKey(request);
  if (apiKeys.length === 0) {
    return { ok: true, context: { authSubject: "anonymous", credential: presented?.source ?? null } };
  }
  if (!presented) {
    return { ok: false, reason: "missing_api_token" };
  }
  if (!apiKeys.includes(presented.key)) {
    return { ok: false, reason: "invalid_api_token" };
  }
  return { ok: true, context: { authSubject: "api_key", credential: presented.source } };
}
