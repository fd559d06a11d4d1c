import { afterEach, describe, expect, it, vi } from 'vitest'
import { debugLog, logError, setDebugLogging, setErrorReporter } from './log'

describe('logging/log', () => {
  afterEach(() => {
    setErrorReporter(null)
    setDebugLogging(null)
    vi.restoreAllMocks()
  })

  it('forwards the first Error and a summary of the args to the reporter', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {})
    const reporter = vi.fn()
    setErrorReporter(reporter)

    const err = new Error('stuck')
    logError('[simulation] step 3 aborted', err)

    expect(reporter).toHaveBeenCalledWith(err, { args: ['[simulation] step 3 aborted', 'object'] })
  })

  it('wraps a message in an Error when none is passed', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {})
    const reporter = vi.fn()
    setErrorReporter(reporter)

    logError('plain message')

    const [reported] = reporter.mock.calls[0] ?? []
    expect(reported).toBeInstanceOf(Error)
    expect(reported instanceof Error && reported.message).toBe('plain message')
  })

  it('prints debug output only when enabled', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})

    setDebugLogging(false)
    debugLog('hidden')
    setDebugLogging(true)
    debugLog('shown')

    expect(log).toHaveBeenCalledTimes(1)
    expect(log).toHaveBeenCalledWith('shown')
  })
})
