/**
 * OAuth2 client configuration schema with field normalization.
 *
 * Accepts `redirect_uri`/`client_id`/`client_secret` spellings as aliases of
 * the camelCase fields.
 *
 * @example
 * ```typescript
 * const options = OAuth2ClientOptionsSchema.parse({
 *   client_id: 'web',
 *   redirect_uri: 'https://app.example.com/callback',
 * });
 * // { clientId: 'web', redirectUri: 'https://app.example.com/callback', scopeSeparator: ' ' }
 * ```
 *
 * @public
 */

import { z } from 'zod';

const ALIASES: Readonly<Record<string, string>> = {
  client_id: 'clientId',
  client_secret: 'clientSecret',
  redirect_uri: 'redirectUri',
};

/**
 * Copies alias keys onto their canonical field unless it is already set, then
 * drops the alias. Shared with the provider config schemas.
 * @public
 */
export function normalizeAliases(
  input: unknown,
  aliases: Readonly<Record<string, string>>,
): unknown {
  if (typeof input !== 'object' || input === null || Array.isArray(input)) {
    return input;
  }

  const result: Record<string, unknown> = { ...input };
  for (const [alias, field] of Object.entries(aliases)) {
    if (alias in result) {
      if (result[field] === undefined) {
        result[field] = result[alias];
      }
      delete result[alias];
    }
  }
  return result;
}

const OAuth2ClientOptionsBaseSchema = z.object({
  clientId: z.string().min(1, 'clientId is required'),
  clientSecret: z.string().min(1).optional(),
  redirectUri: z.string().url().optional(),
  scopeSeparator: z.string().default(' '),
});

export const OAuth2ClientOptionsSchema = z.preprocess(
  (input: unknown) => normalizeAliases(input, ALIASES),
  OAuth2ClientOptionsBaseSchema,
);

/** Parsed client options */
export type OAuth2ClientOptions = z.output<typeof OAuth2ClientOptionsBaseSchema>;

/** Client options as accepted before defaults apply */
export type OAuth2ClientOptionsInput = z.input<typeof OAuth2ClientOptionsBaseSchema>;
