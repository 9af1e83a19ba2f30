/**
 * Session probe configuration, read from the environment.
 *
 * @packageDocumentation
 */

import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';
import {
  ConfigurationError,
  parseLogLevel,
  type LogLevel,
  type OidcCredentialOptions,
} from 'auth-negotiation';

/**
 * The credential the probe connects with.
 */
export type ProbeCredential =
  | { readonly kind: 'anonymous' }
  | {
      readonly kind: 'credentials';
      readonly username: string;
      readonly password: string;
      readonly domain?: string | undefined;
    }
  | { readonly kind: 'oidc'; readonly options: OidcCredentialOptions };

export interface ProbeConfig {
  /** Base URL of the API */
  readonly apiUrl: string;
  /** Path requested once connected, relative to `apiUrl` */
  readonly apiPath: string;
  readonly logLevel: LogLevel;
  readonly requestTimeoutMs?: number | undefined;
  readonly proxyUrl?: string | undefined;
  readonly credential: ProbeCredential;
}

// ============================================================================
// Schemas
// ============================================================================

/** `.env` files leave unset values as empty strings */
const optional = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((value) => (value === '' ? undefined : value), schema.optional());

const required = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((value) => (value === '' ? undefined : value), schema);

const logLevelSchema = z
  .string()
  .transform((value, context): LogLevel => {
    const level = parseLogLevel(value);
    if (level === undefined) {
      context.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Unknown log level "${value}"; use debug, info, warn or error`,
      });
      return z.NEVER;
    }
    return level;
  });

const baseSchema = z.object({
  API_URL: required(z.string().url()),
  API_PATH: optional(z.string()),
  AUTH_MODE: optional(z.enum(['anonymous', 'credentials', 'oidc'])),
  LOG_LEVEL: optional(logLevelSchema),
  REQUEST_TIMEOUT_MS: optional(z.coerce.number().int().positive()),
  PROXY_URL: optional(z.string().url()),
});

const credentialsSchema = z.object({
  API_USERNAME: required(z.string()),
  API_PASSWORD: required(z.string()),
  API_DOMAIN: optional(z.string()),
});

const oidcSchema = z.object({
  OIDC_AUTHORITY: optional(z.string().url()),
  OIDC_CLIENT_ID: optional(z.string()),
  OIDC_CLIENT_SECRET: optional(z.string()),
  OIDC_REDIRECT_URI: optional(z.string().url()),
  OIDC_SCOPES: optional(z.string()),
  OIDC_AUDIENCE: optional(z.string()),
  OIDC_REFRESH_TOKEN: optional(z.string()),
});

const describeIssues = (error: z.ZodError): string =>
  error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');

const parse = <T extends z.ZodTypeAny>(
  schema: T,
  env: Readonly<Record<string, string | undefined>>
): Result<z.output<T>, ConfigurationError> => {
  const parsed = schema.safeParse(env);
  if (!parsed.success) {
    return err(new ConfigurationError(`Invalid environment: ${describeIssues(parsed.error)}`));
  }
  return ok(parsed.data);
};

const splitScopes = (value: string): readonly string[] =>
  value.split(/[\s,]+/).filter((scope) => scope !== '');

// ============================================================================
// Loading
// ============================================================================

const loadCredential = (
  mode: 'anonymous' | 'credentials' | 'oidc',
  env: Readonly<Record<string, string | undefined>>
): Result<ProbeCredential, ConfigurationError> => {
  switch (mode) {
    case 'anonymous':
      return ok({ kind: 'anonymous' });
    case 'credentials':
      return parse(credentialsSchema, env).map(
        (vars): ProbeCredential => ({
          kind: 'credentials',
          username: vars.API_USERNAME,
          password: vars.API_PASSWORD,
          domain: vars.API_DOMAIN,
        })
      );
    case 'oidc':
      return parse(oidcSchema, env).map(
        (vars): ProbeCredential => ({
          kind: 'oidc',
          options: {
            authority: vars.OIDC_AUTHORITY,
            clientId: vars.OIDC_CLIENT_ID,
            clientSecret: vars.OIDC_CLIENT_SECRET,
            redirectUri: vars.OIDC_REDIRECT_URI,
            scopes: vars.OIDC_SCOPES === undefined ? undefined : splitScopes(vars.OIDC_SCOPES),
            audience: vars.OIDC_AUDIENCE,
            refreshToken: vars.OIDC_REFRESH_TOKEN,
          },
        })
      );
    default: {
      const unsupported: never = mode;
      return unsupported;
    }
  }
};

/**
 * Reads the probe configuration from environment variables.
 *
 * Required env vars:
 * - API_URL: Base URL of the API
 *
 * Optional env vars:
 * - API_PATH: Path to request once connected (default: the base URL itself)
 * - AUTH_MODE: anonymous | credentials | oidc (default: anonymous)
 * - API_USERNAME, API_PASSWORD, API_DOMAIN: required (domain optional) for credentials
 * - OIDC_AUTHORITY, OIDC_CLIENT_ID, OIDC_CLIENT_SECRET, OIDC_REDIRECT_URI,
 *   OIDC_SCOPES, OIDC_AUDIENCE, OIDC_REFRESH_TOKEN: for oidc; whatever is left
 *   out is taken from the server's Bearer challenge
 * - LOG_LEVEL: debug | info | warn | error (default: info)
 * - REQUEST_TIMEOUT_MS, PROXY_URL
 */
export const loadProbeConfig = (
  env: Readonly<Record<string, string | undefined>>
): Result<ProbeConfig, ConfigurationError> =>
  parse(baseSchema, env).andThen((base) =>
    loadCredential(base.AUTH_MODE ?? 'anonymous', env).map(
      (credential): ProbeConfig => ({
        apiUrl: base.API_URL,
        apiPath: base.API_PATH ?? '',
        logLevel: base.LOG_LEVEL ?? 'info',
        requestTimeoutMs: base.REQUEST_TIMEOUT_MS,
        proxyUrl: base.PROXY_URL,
        credential,
      })
    )
  );
