import { PythonRuntime } from '../types'
import { runCapture } from '../utils'

const PROBE_SCRIPT = [
  'import json, sys',
  'print(json.dumps({"prefix": sys.prefix, "base_prefix": getattr(sys, "base_prefix", sys.prefix), "path": [p for p in sys.path if p]}))',
].join('\n')

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string')
}

/**
 * Parse the JSON printed by the interpreter probe
 */
export function parseRuntimeProbe(executable: string, output: string): PythonRuntime {
  let data: unknown
  try {
    data = JSON.parse(output)
  } catch (error) {
    throw new Error(`Unexpected output from ${executable}: ${error}`)
  }

  if (typeof data !== 'object' || data === null) {
    throw new Error(`Unexpected output from ${executable}`)
  }
  const prefix: unknown = Reflect.get(data, 'prefix')
  const basePrefix: unknown = Reflect.get(data, 'base_prefix')
  const sysPath: unknown = Reflect.get(data, 'path')
  if (typeof prefix !== 'string' || typeof basePrefix !== 'string' || !isStringArray(sysPath)) {
    throw new Error(`Unexpected output from ${executable}`)
  }

  return { executable, prefix, basePrefix, sysPath }
}

/**
 * Ask the target interpreter where it lives and where it loads packages from
 */
export async function probePythonRuntime(executable: string): Promise<PythonRuntime> {
  const { exitCode, stdout, stderr } = await runCapture(executable, ['-c', PROBE_SCRIPT])
  if (exitCode !== 0) {
    throw new Error(`${executable} exited with status ${exitCode}: ${stderr.trim()}`)
  }
  return parseRuntimeProbe(executable, stdout)
}

export function isVirtualEnv(runtime: PythonRuntime): boolean {
  return runtime.prefix !== runtime.basePrefix
}
