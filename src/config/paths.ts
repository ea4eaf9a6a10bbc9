import path from 'path'
import os from 'os'

/**
 * Get the docsift home directory.
 * Resolution order:
 * 1. DOCSIFT_HOME environment variable
 * 2. XDG_CONFIG_HOME/docsift (Linux)
 * 3. Platform-specific defaults
 */
export function getDocsiftHome(env: NodeJS.ProcessEnv = process.env): string {
  if (env.DOCSIFT_HOME) {
    return env.DOCSIFT_HOME
  }

  if (env.XDG_CONFIG_HOME) {
    return path.join(env.XDG_CONFIG_HOME, 'docsift')
  }

  switch (process.platform) {
    case 'win32':
      return path.join(env.APPDATA || os.homedir(), 'docsift')
    case 'darwin':
      return path.join(os.homedir(), 'Library', 'Application Support', 'docsift')
    default:
      return path.join(os.homedir(), '.docsift')
  }
}

/** Main config file */
export function getConfigPath(env?: NodeJS.ProcessEnv): string {
  return path.join(getDocsiftHome(env), 'config.json')
}

/** Local overrides, merged over config.json */
export function getLocalConfigPath(env?: NodeJS.ProcessEnv): string {
  return path.join(getDocsiftHome(env), 'config.local.json')
}

export function getCredentialsPath(env?: NodeJS.ProcessEnv): string {
  return path.join(getDocsiftHome(env), 'credentials.json')
}

export function getLogsPath(env?: NodeJS.ProcessEnv): string {
  return path.join(getDocsiftHome(env), 'logs')
}

/**
 * Default directory of the JSONL audit trail.
 */
export function getAuditPath(env?: NodeJS.ProcessEnv): string {
  return path.join(getLogsPath(env), 'audit')
}
