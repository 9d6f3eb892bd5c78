import test from 'ava'
import {formatDuration, formatSize, toPosixPath} from '../utils.js'

test('formatSize: bytes', t => {
  t.is(formatSize(512), '512 B')
})

test('formatSize: kilobytes', t => {
  t.is(formatSize(1536), '1.5 KB')
})

test('formatSize: megabytes', t => {
  t.is(formatSize(5 * 1024 * 1024), '5.0 MB')
})

test('formatSize: gigabytes', t => {
  t.is(formatSize(2 * 1024 * 1024 * 1024), '2.0 GB')
})

test('formatDuration: milliseconds', t => {
  t.is(formatDuration(250), '250ms')
})

test('formatDuration: seconds', t => {
  t.is(formatDuration(1500), '1.5s')
})

test('formatDuration: minutes', t => {
  t.is(formatDuration(90_000), '1m 30s')
})

test('toPosixPath: converts backslashes', t => {
  t.is(toPosixPath('roles\\common\\tasks'), 'roles/common/tasks')
})

test('toPosixPath: leaves forward slashes alone', t => {
  t.is(toPosixPath('roles/common'), 'roles/common')
})
