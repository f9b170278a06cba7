import { describe, expect, it } from 'vitest'
import {
  GetParameterCommandInput,
  GetParameterCommandOutput,
  GetParametersByPathCommandInput,
  GetParametersByPathCommandOutput,
} from '@aws-sdk/client-ssm'
import { ParameterStoreApi, SsmInfrastructureSource, translateAwsError } from '../src/services/ssm'
import { AuthenticationError, TransientIOError } from '../src/core/errors'

const ROOT = '/aws/service/global-infrastructure'

const awsError = (name: string, message: string, extra: Record<string, unknown> = {}) =>
  Object.assign(new Error(message), { name, ...extra })

/**
 * Parameter Store stand-in holding a flat name → value map
 */
class FakeParameterStore implements ParameterStoreApi {
  readonly pathRequests: GetParametersByPathCommandInput[] = []
  failure?: Error

  constructor(private readonly parameters: Record<string, string>) {}

  async getParameter(input: GetParameterCommandInput): Promise<GetParameterCommandOutput> {
    if (this.failure) {
      throw this.failure
    }
    const name = input.Name ?? ''
    if (!(name in this.parameters)) {
      throw awsError('ParameterNotFound', `Parameter ${name} not found.`)
    }
    return { Parameter: { Name: name, Value: this.parameters[name] }, $metadata: {} }
  }

  async getParametersByPath(input: GetParametersByPathCommandInput): Promise<GetParametersByPathCommandOutput> {
    this.pathRequests.push(input)
    if (this.failure) {
      throw this.failure
    }
    const prefix = `${input.Path}/`
    const children = Object.keys(this.parameters)
      .filter((name) => name.startsWith(prefix) && !name.slice(prefix.length).includes('/'))
      .sort()

    const start = Number(input.NextToken ?? 0)
    const end = start + (input.MaxResults ?? 10)
    return {
      Parameters: children.slice(start, end).map((name) => ({ Name: name, Value: this.parameters[name] })),
      NextToken: end < children.length ? String(end) : undefined,
      $metadata: {},
    }
  }
}

function storeWithRegions(codes: string[]): Record<string, string> {
  return Object.fromEntries(codes.map((code) => [`${ROOT}/regions/${code}`, code]))
}

describe('SsmInfrastructureSource', () => {
  it('follows pagination when listing regions', async () => {
    const codes = Array.from({ length: 23 }, (_, index) => `xx-test-${String(index + 1).padStart(2, '0')}`)
    const store = new FakeParameterStore(storeWithRegions(codes))

    const listed = await new SsmInfrastructureSource(store).listRegionCodes()

    expect(listed).toEqual(codes)
    expect(store.pathRequests).toHaveLength(3)
    expect(store.pathRequests[0]).toEqual({
      Path: `${ROOT}/regions`,
      Recursive: false,
      MaxResults: 10,
      NextToken: undefined,
    })
    expect(store.pathRequests[2].NextToken).toBe('20')
  })

  it('lists services globally and per region', async () => {
    const store = new FakeParameterStore({
      [`${ROOT}/services/ec2`]: 'ec2',
      [`${ROOT}/services/s3`]: 's3',
      [`${ROOT}/services/s3/longName`]: 'Amazon Simple Storage Service (S3)',
      [`${ROOT}/regions/us-east-1/services/s3`]: 's3',
    })
    const source = new SsmInfrastructureSource(store)

    expect(await source.listServiceCodes()).toEqual(['ec2', 's3'])
    expect(await source.listRegionServices('us-east-1')).toEqual(['s3'])
    expect(await source.getServiceName('s3')).toBe('Amazon Simple Storage Service (S3)')
    expect(await source.getServiceName('ec2')).toBeUndefined()
  })

  it('reads region details', async () => {
    const store = new FakeParameterStore({
      [`${ROOT}/regions/us-east-1/longName`]: 'US East (N. Virginia)',
      [`${ROOT}/regions/us-east-1/partition`]: 'aws',
      [`${ROOT}/regions/us-east-1/launchDate`]: '2006-08-25',
      [`${ROOT}/regions/us-east-1/availability-zones/use1-az1`]: 'use1-az1',
      [`${ROOT}/regions/us-east-1/availability-zones/use1-az2`]: 'use1-az2',
    })

    expect(await new SsmInfrastructureSource(store).getRegionDetails('us-east-1')).toEqual({
      displayName: 'US East (N. Virginia)',
      partition: 'aws',
      launchDate: '2006-08-25',
      availabilityZoneCount: 2,
    })
  })

  it('falls back when region parameters do not exist', async () => {
    const details = await new SsmInfrastructureSource(new FakeParameterStore({})).getRegionDetails('xx-new-1')

    expect(details).toEqual({ displayName: 'xx-new-1', partition: 'Unknown', availabilityZoneCount: 0 })
  })

  it('translates SDK failures into the error taxonomy', async () => {
    const store = new FakeParameterStore({})
    store.failure = awsError('ThrottlingException', 'Rate exceeded')

    await expect(new SsmInfrastructureSource(store).listRegionCodes()).rejects.toBeInstanceOf(TransientIOError)

    store.failure = awsError('ExpiredTokenException', 'The security token included in the request is expired')
    await expect(new SsmInfrastructureSource(store).getServiceName('ec2')).rejects.toBeInstanceOf(AuthenticationError)
  })
})

describe('translateAwsError', () => {
  const reasonOf = (error: unknown) => (error instanceof TransientIOError ? error.reason : undefined)

  it('classifies transient failures', () => {
    expect(reasonOf(translateAwsError(awsError('ThrottlingException', 'Rate exceeded'), 'ctx'))).toBe('throttled')
    expect(reasonOf(translateAwsError(awsError('Error', 'x', { $metadata: { httpStatusCode: 429 } }), 'ctx'))).toBe(
      'throttled',
    )
    expect(reasonOf(translateAwsError(awsError('TimeoutError', 'socket timed out'), 'ctx'))).toBe('timeout')
    expect(reasonOf(translateAwsError(awsError('Error', 'reset', { code: 'ECONNRESET' }), 'ctx'))).toBe('network')
    expect(
      reasonOf(translateAwsError(awsError('InternalServerError', 'x', { $metadata: { httpStatusCode: 503 } }), 'ctx')),
    ).toBe('server')
  })

  it('prefixes the message with the parameter path', () => {
    const translated = translateAwsError(awsError('ThrottlingException', 'Rate exceeded'), '/aws/service/x')
    expect(translated).toBeInstanceOf(TransientIOError)
    expect(translated instanceof Error ? translated.message : '').toBe('/aws/service/x: Rate exceeded')
  })

  it('classifies credential failures', () => {
    for (const name of ['ExpiredTokenException', 'UnrecognizedClientException', 'CredentialsProviderError']) {
      expect(translateAwsError(awsError(name, 'no'), 'ctx')).toBeInstanceOf(AuthenticationError)
    }
  })

  it('passes anything else through unchanged', () => {
    const validation = awsError('ValidationException', 'bad path', { $metadata: { httpStatusCode: 400 } })
    expect(translateAwsError(validation, 'ctx')).toBe(validation)
    expect(translateAwsError('plain string', 'ctx')).toBe('plain string')
  })
})
