/**
 * Token command - issue a signed bearer token for service-to-service calls
 */

import { Command } from 'commander';
import { issueToken } from '../gateway/token.js';

export interface TokenCommandOptions {
  subject: string;
  role?: string;
  ttl?: string;
  issuer?: string;
}

/** Default token lifetime: 1 hour */
const DEFAULT_TTL_SECONDS = 3600;

/**
 * Issue a token from CLI options and the environment
 * @throws Error when the secret is missing or the TTL is invalid
 */
export function issueTokenFromOptions(
  options: TokenCommandOptions,
  env: NodeJS.ProcessEnv = process.env,
  now?: number
): string {
  const secret = env.PORTCULLIS_JWT_SECRET;
  if (!secret) {
    throw new Error('PORTCULLIS_JWT_SECRET is not set');
  }
  if (!options.subject) {
    throw new Error('--subject must not be empty');
  }

  const ttlSeconds = options.ttl === undefined ? DEFAULT_TTL_SECONDS : Number(options.ttl);
  if (!Number.isInteger(ttlSeconds) || ttlSeconds <= 0) {
    throw new Error(`Invalid TTL: ${options.ttl}. Must be a positive number of seconds.`);
  }

  return issueToken({
    secret,
    subject: options.subject,
    role: options.role ?? '',
    issuer: options.issuer ?? env.PORTCULLIS_JWT_ISSUER ?? '',
    ttlSeconds,
    now,
  });
}

export function createTokenCommand(): Command {
  return new Command('token')
    .description('Print a bearer token signed with PORTCULLIS_JWT_SECRET')
    .requiredOption('-s, --subject <subject>', 'Token subject')
    .option('-r, --role <role>', 'Role claim')
    .option('-t, --ttl <seconds>', 'Lifetime in seconds', String(DEFAULT_TTL_SECONDS))
    .option('-i, --issuer <issuer>', 'Issuer claim (default: PORTCULLIS_JWT_ISSUER)')
    .action((options: TokenCommandOptions) => {
      try {
        console.log(issueTokenFromOptions(options));
      } catch (error) {
        console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
        process.exit(1);
      }
    });
}
