import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { buildInstallCommand, PackageUpgrader } from '../src/upgrader'
import { candidate, stripAnsi } from './helpers'

describe('buildInstallCommand', () => {
  it('pins every package to its latest version', () => {
    expect(buildInstallCommand('python3', [candidate('requests', '1.0', '2.0'), candidate('toolkitX', '3.0', '3.1')])).toEqual(
      ['python3', '-m', 'pip', 'install', '--upgrade', 'requests==2.0', 'toolkitX==3.1']
    )
  })

  it('adds --user before the pins and forwards extra args after them', () => {
    expect(
      buildInstallCommand('/opt/py/bin/python', [candidate('rich', '13.0', '13.7')], {
        user: true,
        extraArgs: ['--constraint', 'constraints.txt'],
      })
    ).toEqual([
      '/opt/py/bin/python',
      '-m',
      'pip',
      'install',
      '--upgrade',
      '--user',
      'rich==13.7',
      '--constraint',
      'constraints.txt',
    ])
  })
})

describe('PackageUpgrader', () => {
  let logs: string[]

  beforeEach(() => {
    logs = []
    vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
      logs.push(stripAnsi(args.map(String).join(' ')))
    })
    vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('prints the command and stops on dry run', async () => {
    const confirm = vi.fn().mockResolvedValue(true)
    const run = vi.fn().mockResolvedValue(0)
    const upgrader = new PackageUpgrader('python3', { confirm, run })

    const exitCode = await upgrader.upgradePackages([candidate('requests', '1.0', '2.0')], { dryRun: true })

    expect(exitCode).toBe(0)
    expect(logs).toContain('\nWill run:\n  python3 -m pip install --upgrade requests==2.0')
    expect(confirm).not.toHaveBeenCalled()
    expect(run).not.toHaveBeenCalled()
  })

  it('returns 2 without running pip when the user declines', async () => {
    const run = vi.fn().mockResolvedValue(0)
    const upgrader = new PackageUpgrader('python3', { confirm: vi.fn().mockResolvedValue(false), run })

    const exitCode = await upgrader.upgradePackages([candidate('requests', '1.0', '2.0')])

    expect(exitCode).toBe(2)
    expect(logs).toContain('Cancelled.')
    expect(run).not.toHaveBeenCalled()
  })

  it('runs pip and passes its exit status through', async () => {
    const run = vi.fn().mockResolvedValue(3)
    const upgrader = new PackageUpgrader('python3', { confirm: vi.fn().mockResolvedValue(true), run })

    const exitCode = await upgrader.upgradePackages([candidate('requests', '1.0', '2.0')], {
      user: true,
      extraArgs: ['--no-deps'],
    })

    expect(exitCode).toBe(3)
    expect(run).toHaveBeenCalledWith(
      'python3',
      ['-m', 'pip', 'install', '--upgrade', '--user', 'requests==2.0', '--no-deps'],
      expect.objectContaining({ PIP_DISABLE_PIP_VERSION_CHECK: expect.any(String) })
    )
  })

  it('does nothing for an empty selection', async () => {
    const confirm = vi.fn()
    const run = vi.fn()
    const upgrader = new PackageUpgrader('python3', { confirm, run })

    expect(await upgrader.upgradePackages([])).toBe(0)
    expect(logs).toContain('No packages selected. Nothing to do.')
    expect(confirm).not.toHaveBeenCalled()
    expect(run).not.toHaveBeenCalled()
  })
})
