import test from 'ava'
import axios, {AxiosError, type AxiosAdapter, type InternalAxiosRequestConfig} from 'axios'
import {HttpValidationClient, classifyRequestError, defaultValidationUrl} from '../validation-client.js'
import {projectManifest} from '../manifest-builder.js'
import {manifestSchema} from '../schemas.js'
import {sampleConfig} from '../../__tests__/helpers.js'
import type {Manifest} from '../../types.js'

async function sampleManifest(): Promise<Manifest> {
  const config = await sampleConfig()
  return manifestSchema.parse(projectManifest(config.manifest))
}

function respondWith(data: unknown, requests: InternalAxiosRequestConfig[] = []): AxiosAdapter {
  return async config => {
    requests.push(config)
    return {data, status: 200, statusText: 'OK', headers: {}, config}
  }
}

function failWith(build: (config: InternalAxiosRequestConfig) => AxiosError): AxiosAdapter {
  return async config => {
    throw build(config)
  }
}

test('posts the serialized manifest to the endpoint', async t => {
  const requests: InternalAxiosRequestConfig[] = []
  const client = new HttpValidationClient({
    url: 'https://validation.test/block',
    timeoutMs: 1500,
    http: axios.create({adapter: respondWith({data: {valid: true, errors: []}}, requests)})
  })
  const manifest = await sampleManifest()

  const result = await client.validate(manifest)

  t.deepEqual(result, {ok: true, value: {valid: true, errors: []}})
  t.is(requests.length, 1)
  const [request] = requests
  t.is(request?.method, 'post')
  t.is(request?.url, 'https://validation.test/block')
  t.is(request?.timeout, 1500)
  t.is(request?.data, JSON.stringify(manifest))
  t.is(request?.headers.get('Content-Type'), 'application/json')
})

test('uses the platform endpoint by default', t => {
  t.is(new HttpValidationClient().url, defaultValidationUrl)
})

test('an invalid verdict carries the server errors as strings', async t => {
  const client = new HttpValidationClient({
    http: axios.create({adapter: respondWith({data: {valid: false, errors: ['name: must be lowercase', {field: 'machine'}]}})})
  })

  const result = await client.validate(await sampleManifest())

  t.deepEqual(result, {ok: true, value: {valid: false, errors: ['name: must be lowercase', '{"field":"machine"}']}})
})

test('an unexpected body is an unexpected error', async t => {
  const client = new HttpValidationClient({http: axios.create({adapter: respondWith({result: 'ok'})})})
  const result = await client.validate(await sampleManifest())
  t.false(result.ok)
  if (!result.ok) {
    t.is(result.error.reason, 'other')
    t.is(result.error.message, 'Unexpected error: unexpected response from the validation endpoint')
  }
})

test('an HTTP error status is reported with the status line', async t => {
  const client = new HttpValidationClient({
    http: axios.create({
      adapter: failWith(config => new AxiosError('Request failed with status code 503', 'ERR_BAD_RESPONSE', config, undefined, {
        data: '', status: 503, statusText: 'Service Unavailable', headers: {}, config
      }))
    })
  })

  const result = await client.validate(await sampleManifest())
  t.false(result.ok)
  if (!result.ok) {
    t.is(result.error.kind, 'REQUEST_FAILED')
    t.is(result.error.reason, 'http')
    t.is(result.error.status, 503)
    t.is(result.error.message, 'HTTP error: 503 Service Unavailable')
  }
})

test('a timeout is reported as such', async t => {
  const client = new HttpValidationClient({
    timeoutMs: 50,
    http: axios.create({adapter: failWith(config => new AxiosError('timeout of 50ms exceeded', 'ECONNABORTED', config))})
  })

  const result = await client.validate(await sampleManifest())
  t.false(result.ok)
  if (!result.ok) {
    t.is(result.error.reason, 'timeout')
    t.is(result.error.message, 'Timeout error: timeout of 50ms exceeded')
  }
})

test('a refused connection is a connection error', async t => {
  const client = new HttpValidationClient({
    http: axios.create({adapter: failWith(config => new AxiosError('connect ECONNREFUSED 127.0.0.1:9', 'ECONNREFUSED', config))})
  })

  const result = await client.validate(await sampleManifest())
  t.false(result.ok)
  if (!result.ok) {
    t.is(result.error.reason, 'connection')
    t.is(result.error.message, 'Error connecting: connect ECONNREFUSED 127.0.0.1:9')
  }
})

test('classifyRequestError treats anything else as unexpected', t => {
  const error = classifyRequestError(new Error('boom'))
  t.is(error.reason, 'other')
  t.is(error.message, 'Unexpected error: boom')
  t.is(classifyRequestError(new AxiosError('stream aborted', 'ERR_BAD_OPTION')).reason, 'other')
})
