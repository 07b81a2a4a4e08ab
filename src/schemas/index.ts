/**
 * Zod schemas for credential files, token endpoint payloads and environment
 * configuration.
 */

import { z } from 'zod';

/**
 * Service account JSON key as downloaded from the Cloud Console.
 * Only the fields needed to mint a token are required.
 */
export const ServiceAccountKeySchema = z
  .object({
    type: z.literal('service_account').optional(),
    project_id: z.string().min(1),
    private_key_id: z.string().min(1).optional(),
    private_key: z.string().min(1),
    client_email: z.string().min(1),
    token_uri: z.string().url(),
  })
  .passthrough();

export type ServiceAccountKey = z.infer<typeof ServiceAccountKeySchema>;

/** `gcloud auth application-default login` output */
export const AuthorizedUserSchema = z.object({
  type: z.literal('authorized_user'),
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
  refresh_token: z.string().min(1),
  quota_project_id: z.string().min(1).optional(),
});

export type AuthorizedUser = z.infer<typeof AuthorizedUserSchema>;

/** `gcloud auth application-default login --impersonate-service-account` output */
export const ImpersonatedServiceAccountSchema = z.object({
  type: z.literal('impersonated_service_account'),
  service_account_impersonation_url: z.string().url(),
  source_credentials: AuthorizedUserSchema.extend({ type: z.literal('authorized_user').optional() }),
  delegates: z.array(z.string()).default([]),
  quota_project_id: z.string().min(1).optional(),
});

export type ImpersonatedServiceAccount = z.infer<typeof ImpersonatedServiceAccountSchema>;

/** Application-default credential file, dispatched on `type` */
export const CredentialFileSchema = z.discriminatedUnion('type', [ServiceAccountKeySchema.extend({ type: z.literal('service_account') }), AuthorizedUserSchema, ImpersonatedServiceAccountSchema]);

export type CredentialFile = z.infer<typeof CredentialFileSchema>;

/** OAuth token endpoint and metadata server success payload */
export const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().nonnegative(),
  token_type: z
    .string()
    .refine((value) => value.toLowerCase() === 'bearer', { message: 'token_type must be Bearer' })
    .optional(),
});

export type TokenResponse = z.infer<typeof TokenResponseSchema>;

/** IAM Credentials `generateAccessToken` success payload */
export const ImpersonationResponseSchema = z.object({
  accessToken: z.string().min(1),
  expireTime: z.string().datetime({ offset: true }),
});

export type ImpersonationResponse = z.infer<typeof ImpersonationResponseSchema>;

const optionalNonEmpty = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

const blankToUndefined = (value: unknown) => (typeof value === 'string' && !value.trim() ? undefined : value);

/** Environment variables read by {@link parseConfig} */
export const EnvSchema = z.object({
  GOOGLE_APPLICATION_CREDENTIALS: optionalNonEmpty,
  GOOGLE_CLOUD_PROJECT: optionalNonEmpty,
  GCLOUD_PROJECT: optionalNonEmpty,
  GCE_METADATA_HOST: optionalNonEmpty,
  CLOUDSDK_CONFIG: optionalNonEmpty,
  HOME: optionalNonEmpty,
  APPDATA: optionalNonEmpty,
  GCP_AUTH_SCOPES: optionalNonEmpty,
  GCP_AUTH_MAX_RETRIES: z.preprocess(blankToUndefined, z.coerce.number().int().nonnegative().optional()),
  GCP_AUTH_METADATA_TIMEOUT_MS: z.preprocess(blankToUndefined, z.coerce.number().int().positive().optional()),
});
