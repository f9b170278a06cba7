// File: src/services/sts.ts
// AWS Security Token Service (STS) operations
// Used once before a fresh collection to fail fast on missing or expired credentials.

import { GetCallerIdentityCommandInput, GetCallerIdentityCommandOutput } from '@aws-sdk/client-sts'
import { AuthenticationError, describeError } from '../core/errors'

/**
 * The one STS call this tool makes. The aggregated `STS` client satisfies it.
 */
export interface CallerIdentityApi {
  getCallerIdentity(input: GetCallerIdentityCommandInput): Promise<GetCallerIdentityCommandOutput>
}

export interface CallerIdentity {
  account: string
  arn: string
}

/**
 * Confirm the configured credentials are usable
 *
 * @param api - STS client built for the configured profile and region
 * @returns The account and ARN the credentials resolve to
 * @throws AuthenticationError when the call fails for any reason
 */
export async function verifyCredentials(api: CallerIdentityApi): Promise<CallerIdentity> {
  try {
    const response = await api.getCallerIdentity({})
    return {
      account: response.Account ?? '',
      arn: response.Arn ?? '',
    }
  } catch (error) {
    throw new AuthenticationError(`Unable to verify AWS credentials: ${describeError(error)}`, error)
  }
}
