import test from 'ava'
import {errorMessage, formatDuration} from '../utils.js'

test('formatDuration: milliseconds below one second', t => {
  t.is(formatDuration(500), '500ms')
})

test('formatDuration: seconds with one decimal', t => {
  t.is(formatDuration(1500), '1.5s')
})

test('formatDuration: minutes and seconds', t => {
  t.is(formatDuration(125_000), '2m 5s')
})

test('errorMessage reads Error messages and stringifies the rest', t => {
  t.is(errorMessage(new Error('boom')), 'boom')
  t.is(errorMessage(42), '42')
})
