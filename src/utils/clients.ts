// File: src/utils/clients.ts
// Client creation utilities

import { SSM, SSMClientConfig } from '@aws-sdk/client-ssm'
import { STS, STSClientConfig } from '@aws-sdk/client-sts'
import { fromIni } from '@aws-sdk/credential-providers'
import { Settings } from '../config/settings'

type ClientSettings = Pick<Settings, 'awsProfile' | 'awsRegion'>

/**
 * Create a Systems Manager client
 *
 * SDK-level retries are turned off; the collector's retry policy owns them.
 */
export function createSSMClient(settings: ClientSettings): SSM {
  const clientConfig: SSMClientConfig = {
    region: settings.awsRegion,
    maxAttempts: 1,
  }

  // If profile is specified, use credentials from profile
  if (settings.awsProfile) {
    clientConfig.credentials = fromIni({ profile: settings.awsProfile })
  }

  return new SSM(clientConfig)
}

/**
 * Create an STS client
 */
export function createSTSClient(settings: ClientSettings): STS {
  const clientConfig: STSClientConfig = {
    region: settings.awsRegion,
  }

  if (settings.awsProfile) {
    clientConfig.credentials = fromIni({ profile: settings.awsProfile })
  }

  return new STS(clientConfig)
}
