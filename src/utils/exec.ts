import { spawn } from 'child_process'

export interface CapturedOutput {
  exitCode: number
  stdout: string
  stderr: string
}

export type CommandEnv = Record<string, string | undefined>

/**
 * Run a command to completion, capturing stdout and stderr
 */
export function runCapture(command: string, args: string[], env?: CommandEnv): Promise<CapturedOutput> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { env, stdio: ['ignore', 'pipe', 'pipe'] })
    let stdout = ''
    let stderr = ''

    child.stdout.setEncoding('utf-8')
    child.stderr.setEncoding('utf-8')
    child.stdout.on('data', (chunk: string) => {
      stdout += chunk
    })
    child.stderr.on('data', (chunk: string) => {
      stderr += chunk
    })

    child.on('error', (error) => {
      reject(new Error(`Command failed: ${command} ${args.join(' ')}\n${error.message}`))
    })
    child.on('close', (code) => {
      resolve({ exitCode: code ?? 1, stdout, stderr })
    })
  })
}

/**
 * Run a command with the terminal attached and resolve with its exit status
 */
export function runStream(command: string, args: string[], env?: CommandEnv): Promise<number> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { env, stdio: 'inherit' })
    child.on('error', (error) => {
      reject(new Error(`Command failed: ${command} ${args.join(' ')}\n${error.message}`))
    })
    child.on('close', (code) => resolve(code ?? 1))
  })
}

/**
 * Environment for pip subprocesses: quiet version check, unbuffered output
 */
export function pipEnv(base: CommandEnv = process.env): CommandEnv {
  return {
    ...base,
    PIP_DISABLE_PIP_VERSION_CHECK: base.PIP_DISABLE_PIP_VERSION_CHECK ?? '1',
    PYTHONUNBUFFERED: base.PYTHONUNBUFFERED ?? '1',
  }
}
