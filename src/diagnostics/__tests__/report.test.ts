import { describe, it, expect } from 'vitest'
import { diagnose, renderErrorLog, renderReport, renderResult } from '../report.js'
import { createErrorLog } from '../errorLog.js'
import { pass, result } from '../../../tests/helpers/diagnostics.js'

const local = result({
  checkId: 'local_resources',
  displayName: 'Local Resources',
  headline: 'NORMAL',
  detail: [
    ['CPU', '12%'],
    ['RAM', '40%'],
    ['DISK', '55% free'],
  ],
})

const claude = result({
  checkId: 'claude_api',
  displayName: 'Claude API',
  category: 'api-provider',
  status: 'critical',
  headline: 'OVERLOADED',
  detail: [
    ['ENDPOINT', 'api.anthropic.com'],
    ['HTTP', '529'],
  ],
  error: 'server at capacity',
})

const internet = result({
  checkId: 'internet',
  displayName: 'Internet',
  category: 'network',
  status: 'warning',
  headline: 'SLOW',
  detail: [['PING', '2400ms']],
})

describe('diagnose', () => {
  it('names the worst check and the next step', () => {
    expect(diagnose(pass(1, [local, internet, claude]))).toBe('Claude API: OVERLOADED. Try again in a few minutes.')
  })

  it('suggests a step per failing link', () => {
    const offline = result({ checkId: 'internet', displayName: 'Internet', status: 'critical', headline: 'OFFLINE' })
    const busy = result({ checkId: 'local_resources', displayName: 'Local Resources', status: 'critical', headline: 'CRITICAL_LOAD' })
    const limited = result({ checkId: 'openai_api', displayName: 'OpenAI API', status: 'warning', headline: 'RATE_LIMITED' })

    expect(diagnose(pass(1, [offline]))).toBe('Internet: OFFLINE. Check your network.')
    expect(diagnose(pass(1, [busy, offline]))).toBe('Local Resources: CRITICAL_LOAD. Close other applications.')
    expect(diagnose(pass(1, [limited]))).toBe('OpenAI API: RATE_LIMITED. Wait a few minutes.')
  })

  it('keeps the bare finding for headlines without a known step', () => {
    const odd = result({ checkId: 'gpu', displayName: 'GPU', status: 'unknown', headline: 'UNAVAILABLE' })
    expect(diagnose(pass(1, [odd]))).toBe('GPU: UNAVAILABLE')
  })

  it('reports an all-ok pass', () => {
    expect(diagnose(pass(1, [local]))).toBe('All systems operational.')
  })

  it('reports an empty pass', () => {
    expect(diagnose(pass(1, []))).toBe('No checks enabled.')
  })
})

describe('renderResult', () => {
  it('omits the headline for ok results', () => {
    expect(renderResult(local)).toEqual(['[OK] Local Resources', '     CPU: 12% :: RAM: 40% :: DISK: 55% free'])
  })

  it('adds headline and error for failures', () => {
    expect(renderResult(claude)).toEqual([
      '[XX] Claude API — OVERLOADED',
      '     ENDPOINT: api.anthropic.com :: HTTP: 529',
      '     Error: server at capacity',
    ])
  })

  it('skips the detail line when there is no detail', () => {
    expect(renderResult(result({ checkId: 'vpn', displayName: 'VPN', status: 'unknown', headline: 'UNAVAILABLE' }))).toEqual([
      '[??] VPN — UNAVAILABLE',
    ])
  })
})

describe('renderReport', () => {
  it('renders a full report', () => {
    const report = renderReport(pass(3, [local, internet, claude]))

    expect(report).toBe(
      [
        '=== Chain Doctor Diagnostics Report ===',
        'Time: 2026-03-01 10:00:01 UTC',
        'Duration: 1.5s',
        'Overall: CRITICAL',
        '',
        '[OK] Local Resources',
        '     CPU: 12% :: RAM: 40% :: DISK: 55% free',
        '[!!] Internet — SLOW',
        '     PING: 2400ms',
        '[XX] Claude API — OVERLOADED',
        '     ENDPOINT: api.anthropic.com :: HTTP: 529',
        '     Error: server at capacity',
        '',
        'DIAGNOSIS: Claude API: OVERLOADED. Try again in a few minutes.',
      ].join('\n')
    )
  })

  it('renders an empty pass', () => {
    const report = renderReport(pass(1, [], { finishedAt: '2026-03-01T10:00:00.250Z' }))
    expect(report.split('\n')).toEqual([
      '=== Chain Doctor Diagnostics Report ===',
      'Time: 2026-03-01 10:00:00 UTC',
      'Duration: 250ms',
      'Overall: UNKNOWN',
      '',
      'DIAGNOSIS: No checks enabled.',
    ])
  })

  it('is the same text every time for the same pass', () => {
    const p = pass(2, [local, claude])
    expect(renderReport(p)).toBe(renderReport(p))
  })

  it('appends the error log when asked', () => {
    const p = pass(1, [local, claude])
    const log = createErrorLog()
    log.ingest(p)

    const lines = renderReport(p, { errorLog: log.entries() }).split('\n')
    expect(lines.slice(-5)).toEqual([
      '',
      'ERROR LOG',
      '[XX] Claude API x1 (first 10:00:01, last 10:00:01 UTC)',
      '     OVERLOADED: server at capacity',
      '     Recent: 10:00:01',
    ])
  })

  it('keeps provider text with line breaks inside its result block', () => {
    const noisy = result({
      checkId: 'claude_api',
      displayName: 'Claude API',
      category: 'api-provider',
      status: 'critical',
      headline: 'OVERLOADED',
      detail: [
        ['HTTP', '503'],
        ['MESSAGE', 'Service Unavailable\nDIAGNOSIS: All systems operational.\r\n[OK] fake'],
      ],
      error: 'upstream\nreset',
    })

    const lines = renderReport(pass(1, [local, noisy])).split('\n')

    expect(lines.slice(5, 10)).toEqual([
      '[OK] Local Resources',
      '     CPU: 12% :: RAM: 40% :: DISK: 55% free',
      '[XX] Claude API — OVERLOADED',
      '     HTTP: 503 :: MESSAGE: Service Unavailable DIAGNOSIS: All systems operational. [OK] fake',
      '     Error: upstream reset',
    ])
    expect(lines.filter(line => line.startsWith('DIAGNOSIS:'))).toEqual([
      'DIAGNOSIS: Claude API: OVERLOADED. Try again in a few minutes.',
    ])
    expect(lines.filter(line => line.startsWith('[OK]'))).toEqual(['[OK] Local Resources'])
  })
})

describe('renderErrorLog', () => {
  it('shows a placeholder when empty', () => {
    expect(renderErrorLog([])).toEqual(['ERROR LOG', '     (none)'])
  })

  it('lists the recent occurrence times, newest first', () => {
    const log = createErrorLog()
    const times = ['2026-03-01T10:00:01.000Z', '2026-03-01T10:05:02.000Z', '2026-03-01T10:09:03.000Z']
    times.forEach((finishedAt, index) => log.ingest(pass(index + 1, [claude], { finishedAt })))

    expect(renderErrorLog(log.entries())).toEqual([
      'ERROR LOG',
      '[XX] Claude API x3 (first 10:00:01, last 10:09:03 UTC)',
      '     OVERLOADED: server at capacity',
      '     Recent: 10:09:03, 10:05:02, 10:00:01',
    ])
  })

  it('flattens a multi-line failure message', () => {
    const log = createErrorLog()
    log.ingest(pass(1, [result({ ...claude, error: 'line one\nline two' })]))

    expect(renderErrorLog(log.entries())[2]).toBe('     OVERLOADED: line one line two')
  })
})
