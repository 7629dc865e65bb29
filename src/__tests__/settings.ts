import test from 'ava'
import {defaultValidationUrl} from '../core/validation-client.js'
import {loadSettings} from '../settings.js'

test('loadSettings falls back to defaults', t => {
  t.deepEqual(loadSettings({}), {
    validationUrl: defaultValidationUrl,
    validationTimeoutMs: 30_000,
    dockerBinary: 'docker'
  })
})

test('loadSettings reads overrides and coerces the timeout', t => {
  const settings = loadSettings({
    BLOCKPACK_VALIDATION_URL: 'http://localhost:8080/validate',
    BLOCKPACK_VALIDATION_TIMEOUT_MS: '1500',
    BLOCKPACK_DOCKER_BINARY: 'podman',
    UNRELATED: 'ignored'
  })

  t.deepEqual(settings, {
    validationUrl: 'http://localhost:8080/validate',
    validationTimeoutMs: 1500,
    dockerBinary: 'podman'
  })
})

test('loadSettings rejects an invalid url', t => {
  t.throws(() => loadSettings({BLOCKPACK_VALIDATION_URL: 'not a url'}), {
    message: 'Invalid environment: BLOCKPACK_VALIDATION_URL: Invalid url'
  })
})

test('loadSettings rejects a non-positive timeout', t => {
  const error = t.throws(() => loadSettings({BLOCKPACK_VALIDATION_TIMEOUT_MS: '0'}))
  t.true(error?.message.startsWith('Invalid environment: BLOCKPACK_VALIDATION_TIMEOUT_MS: '))
})
