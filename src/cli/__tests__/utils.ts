import test from 'ava'
import {defaultValidationUrl} from '../../core/validation-client.js'
import {parsePositiveInteger, resolveSettings} from '../utils.js'

test('parsePositiveInteger accepts positive integers', t => {
  t.is(parsePositiveInteger('1500'), 1500)
})

test('parsePositiveInteger rejects anything else', t => {
  for (const value of ['abc', '0', '-5', '1.5']) {
    t.throws(() => parsePositiveInteger(value), {message: `Expected a positive integer, got "${value}"`})
  }
})

test('resolveSettings lets flags override the environment', t => {
  const settings = resolveSettings(
    {validationTimeout: 10},
    {BLOCKPACK_VALIDATION_TIMEOUT_MS: '2000', BLOCKPACK_DOCKER_BINARY: 'podman'}
  )

  t.deepEqual(settings, {validationUrl: defaultValidationUrl, validationTimeoutMs: 10, dockerBinary: 'podman'})
})

test('resolveSettings keeps the environment when no flag is given', t => {
  const settings = resolveSettings({}, {BLOCKPACK_VALIDATION_URL: 'http://localhost:9000/validate'})
  t.is(settings.validationUrl, 'http://localhost:9000/validate')
  t.is(settings.validationTimeoutMs, 30_000)
})
