import test from 'ava'
import {formatDuration, statusPrefix} from '../utils.js'

test('formatDuration: milliseconds', t => {
  t.is(formatDuration(450), '450ms')
})

test('formatDuration: seconds', t => {
  t.is(formatDuration(2500), '2.5s')
})

test('formatDuration: minutes', t => {
  t.is(formatDuration(125_000), '2m 5s')
})

test('statusPrefix', t => {
  t.is(statusPrefix('2/3, failed: 1'), '[parsnip] [2/3, failed: 1]')
})
