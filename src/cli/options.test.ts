import { describe, expect, it } from 'vitest'
import { parseArgs } from './options.js'
import { UsageError } from '../errors.js'

describe('parseArgs', () => {
  it('maps short and long flags to actions', () => {
    expect(parseArgs(['-c'])).toBe('connect')
    expect(parseArgs(['--connect'])).toBe('connect')
    expect(parseArgs(['-x'])).toBe('connect-proxied')
    expect(parseArgs(['--connect-proxied'])).toBe('connect-proxied')
    expect(parseArgs(['-d'])).toBe('describe')
    expect(parseArgs(['--password'])).toBe('password')
    expect(parseArgs(['-t'])).toBe('convenience')
    expect(parseArgs(['--execute-convenience'])).toBe('convenience')
    expect(parseArgs(['--help'])).toBe('help')
  })

  it('shows help without arguments', () => {
    expect(parseArgs([])).toBe('help')
    expect(parseArgs(['--'])).toBe('help')
  })

  it('accepts a repeated flag', () => {
    expect(parseArgs(['-c', '--connect'])).toBe('connect')
  })

  it('rejects unknown options', () => {
    expect(() => parseArgs(['-z'])).toThrow(new UsageError('Unrecognized option.'))
    expect(() => parseArgs(['--route-through-proxy'])).toThrow('Unrecognized option.')
  })

  it('rejects positional arguments', () => {
    expect(() => parseArgs(['db1'])).toThrow('Unrecognized argument.')
    expect(() => parseArgs(['-c', '--', 'db1'])).toThrow('Unrecognized argument.')
  })

  it('rejects more than one action', () => {
    expect(() => parseArgs(['-c', '-d'])).toThrow('Options are mutually exclusive.')
    expect(() => parseArgs(['-hc'])).toThrow('Options are mutually exclusive.')
  })
})
