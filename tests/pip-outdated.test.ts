import { describe, it, expect, vi, beforeEach } from 'vitest'
import { QueryFailedError } from '../src/errors'
import { parseOutdatedJson, PipOutdatedQuery } from '../src/services/pip-outdated'
import { runCapture } from '../src/utils/exec'

vi.mock('../src/utils/exec', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../src/utils/exec')>()
  return { ...actual, runCapture: vi.fn() }
})

describe('parseOutdatedJson', () => {
  it('parses pip list --outdated records', () => {
    const output = JSON.stringify([
      { name: 'requests', version: '1.0', latest_version: '2.0', latest_filetype: 'wheel' },
      { name: 'toolkitX', version: '3.0', latest_version: '3.1', latest_filetype: 'sdist' },
    ])

    expect(parseOutdatedJson(output)).toEqual([
      { name: 'requests', currentVersion: '1.0', latestVersion: '2.0' },
      { name: 'toolkitX', currentVersion: '3.0', latestVersion: '3.1' },
    ])
  })

  it('drops records missing a name, current or latest version', () => {
    const output = JSON.stringify([
      { name: 'a', version: '1.0' },
      { version: '1.0', latest_version: '2.0' },
      { name: 'b', version: '', latest_version: '2.0' },
      { name: 'c', version: '1.0', latest_version: '1.1' },
    ])

    expect(parseOutdatedJson(output)).toEqual([{ name: 'c', currentVersion: '1.0', latestVersion: '1.1' }])
  })

  it('skips items that are not objects and stringifies field values', () => {
    const output = JSON.stringify(['oops', null, [1, 2], { name: 'd', version: 1, latest_version: 2 }])

    expect(parseOutdatedJson(output)).toEqual([{ name: 'd', currentVersion: '1', latestVersion: '2' }])
  })

  it('returns no candidates for empty, invalid or unexpected payloads', () => {
    expect(parseOutdatedJson('')).toEqual([])
    expect(parseOutdatedJson('  \n')).toEqual([])
    expect(parseOutdatedJson('WARNING: something odd')).toEqual([])
    expect(parseOutdatedJson('{"name": "requests"}')).toEqual([])
  })
})

describe('PipOutdatedQuery', () => {
  const mockedRunCapture = vi.mocked(runCapture)

  beforeEach(() => {
    mockedRunCapture.mockReset()
  })

  it('runs pip list through the given interpreter with version checks disabled', async () => {
    mockedRunCapture.mockResolvedValue({
      exitCode: 0,
      stdout: '[{"name": "requests", "version": "1.0", "latest_version": "2.0"}]',
      stderr: '',
    })

    const candidates = await new PipOutdatedQuery('/usr/bin/python3', { PATH: '/usr/bin' }).query()

    expect(candidates).toEqual([{ name: 'requests', currentVersion: '1.0', latestVersion: '2.0' }])
    expect(mockedRunCapture).toHaveBeenCalledWith(
      '/usr/bin/python3',
      ['-m', 'pip', 'list', '--outdated', '--format=json'],
      { PATH: '/usr/bin', PIP_DISABLE_PIP_VERSION_CHECK: '1', PYTHONUNBUFFERED: '1' }
    )
  })

  it('fails with pip exit status and stderr when pip exits nonzero', async () => {
    mockedRunCapture.mockResolvedValue({ exitCode: 3, stdout: '', stderr: 'network error\n' })

    const error = await new PipOutdatedQuery('python3', {}).query().catch((reason: unknown) => reason)

    expect(error).toBeInstanceOf(QueryFailedError)
    expect(error).toMatchObject({ exitCode: 3, stderr: 'network error' })
  })
})
