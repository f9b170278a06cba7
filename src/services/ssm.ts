// File: src/services/ssm.ts
// AWS Systems Manager Parameter Store operations
// This module reads the public global-infrastructure namespace to discover regions,
// services and per-region service availability, and maps SDK failures onto the
// error taxonomy the collector understands.

import {
  GetParameterCommandInput,
  GetParameterCommandOutput,
  GetParametersByPathCommandInput,
  GetParametersByPathCommandOutput,
} from '@aws-sdk/client-ssm'
import { InfrastructureSource, RegionDetails } from '../types'
import { GLOBAL_INFRASTRUCTURE_PATH } from '../config/constants'
import { AuthenticationError, ReporterError, TransientIOError } from '../core/errors'

/**
 * The two Parameter Store reads this tool needs. The aggregated `SSM` client satisfies it.
 */
export interface ParameterStoreApi {
  getParameter(input: GetParameterCommandInput): Promise<GetParameterCommandOutput>
  getParametersByPath(input: GetParametersByPathCommandInput): Promise<GetParametersByPathCommandOutput>
}

// SSM public parameters reject larger pages
const PAGE_SIZE = 10

const THROTTLING_ERRORS = new Set([
  'Throttling',
  'ThrottlingException',
  'TooManyRequestsException',
  'RequestLimitExceeded',
  'SlowDown',
])

const AUTHENTICATION_ERRORS = new Set([
  'CredentialsProviderError',
  'ExpiredToken',
  'ExpiredTokenException',
  'IncompleteSignature',
  'InvalidClientTokenId',
  'InvalidSignatureException',
  'MissingAuthenticationToken',
  'SignatureDoesNotMatch',
  'UnrecognizedClientException',
  'AccessDeniedException',
])

const TIMEOUT_ERRORS = new Set(['TimeoutError', 'RequestTimeout', 'RequestTimeoutException', 'ETIMEDOUT'])

const NETWORK_ERRORS = new Set(['ECONNRESET', 'ECONNREFUSED', 'EPIPE', 'ENOTFOUND', 'EAI_AGAIN', 'NetworkingError'])

function errorCode(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') {
    return error.code
  }
  return undefined
}

function httpStatus(error: Error): number | undefined {
  if (!('$metadata' in error)) {
    return undefined
  }
  const metadata = error.$metadata
  if (typeof metadata === 'object' && metadata !== null && 'httpStatusCode' in metadata) {
    return typeof metadata.httpStatusCode === 'number' ? metadata.httpStatusCode : undefined
  }
  return undefined
}

/**
 * Map an SDK failure onto the error taxonomy
 *
 * Throttling, timeouts, dropped connections and 5xx responses become
 * {@link TransientIOError}; credential problems become {@link AuthenticationError};
 * anything else is returned unchanged.
 *
 * @param error - Whatever the SDK threw
 * @param context - Parameter name or path, used in messages
 */
export function translateAwsError(error: unknown, context: string): unknown {
  if (error instanceof ReporterError || !(error instanceof Error)) {
    return error
  }

  const names = [error.name, errorCode(error)]
  const status = httpStatus(error)
  const message = `${context}: ${error.message}`

  if (names.some((name) => name !== undefined && AUTHENTICATION_ERRORS.has(name))) {
    return new AuthenticationError(message, error)
  }
  if (names.some((name) => name !== undefined && THROTTLING_ERRORS.has(name)) || status === 429) {
    return new TransientIOError('throttled', message, error)
  }
  if (names.some((name) => name !== undefined && TIMEOUT_ERRORS.has(name))) {
    return new TransientIOError('timeout', message, error)
  }
  if (names.some((name) => name !== undefined && NETWORK_ERRORS.has(name))) {
    return new TransientIOError('network', message, error)
  }
  if (status !== undefined && status >= 500) {
    return new TransientIOError('server', message, error)
  }

  return error
}

function isParameterNotFound(error: unknown): boolean {
  return error instanceof Error && (error.name === 'ParameterNotFound' || error.name === 'ParameterNotFoundException')
}

/**
 * Parameter Store backed implementation of {@link InfrastructureSource}
 *
 * Calls are made once per method invocation; retrying is left to the caller's policy.
 */
export class SsmInfrastructureSource implements InfrastructureSource {
  constructor(
    private readonly api: ParameterStoreApi,
    private readonly basePath: string = GLOBAL_INFRASTRUCTURE_PATH,
  ) {}

  listRegionCodes(): Promise<string[]> {
    return this.listValues(`${this.basePath}/regions`)
  }

  listServiceCodes(): Promise<string[]> {
    return this.listValues(`${this.basePath}/services`)
  }

  listRegionServices(regionCode: string): Promise<string[]> {
    return this.listValues(`${this.basePath}/regions/${regionCode}/services`)
  }

  async getServiceName(serviceCode: string): Promise<string | undefined> {
    return this.getValue(`${this.basePath}/services/${serviceCode}/longName`)
  }

  /**
   * Read the region's display name, partition, launch date and availability zone count.
   * Parameters that do not exist fall back to the region code, "Unknown", no date and zero.
   */
  async getRegionDetails(regionCode: string): Promise<RegionDetails> {
    const regionPath = `${this.basePath}/regions/${regionCode}`
    const [displayName, partition, launchDate, zones] = await Promise.all([
      this.getValue(`${regionPath}/longName`),
      this.getValue(`${regionPath}/partition`),
      this.getValue(`${regionPath}/launchDate`),
      this.listValues(`${regionPath}/availability-zones`),
    ])

    return {
      displayName: displayName || regionCode,
      partition: partition || 'Unknown',
      launchDate: launchDate || undefined,
      availabilityZoneCount: zones.length,
    }
  }

  /**
   * Values of every parameter directly under a path, following pagination
   */
  private async listValues(parameterPath: string): Promise<string[]> {
    const values: string[] = []
    let nextToken: string | undefined

    try {
      do {
        const response = await this.api.getParametersByPath({
          Path: parameterPath,
          Recursive: false,
          MaxResults: PAGE_SIZE,
          NextToken: nextToken,
        })

        for (const parameter of response.Parameters ?? []) {
          if (parameter.Value) {
            values.push(parameter.Value)
          }
        }

        nextToken = response.NextToken
      } while (nextToken)
    } catch (error) {
      throw translateAwsError(error, parameterPath)
    }

    return values
  }

  private async getValue(name: string): Promise<string | undefined> {
    try {
      const response = await this.api.getParameter({ Name: name })
      return response.Parameter?.Value
    } catch (error) {
      if (isParameterNotFound(error)) {
        return undefined
      }
      throw translateAwsError(error, name)
    }
  }
}
