import { readFile, stat } from 'node:fs/promises'
import { dirname, isAbsolute, resolve } from 'node:path'
import { z } from 'zod'
import { ConfigurationError } from '../../core/errors'
import { resolveTokenLength } from './token'
import type { CSRFProtectorOptions, ProtectorConfig, ProtectorConfigInput } from './types'

/**
 * Config file looked up when neither `options.config` nor
 * `CSRF_PROTECTOR_CONFIG` is set
 */
export const DEFAULT_CONFIG_FILE = 'csrfprotector.config.json'

export const DEFAULT_DISABLED_JS_MESSAGE =
  'This site attempts to protect users against Cross-Site Request Forgeries attacks. ' +
  'In order to do so, you must have JavaScript enabled in your web browser otherwise ' +
  'this site will fail to work correctly for you. ' +
  'See details of your web browser for how to enable JavaScript.'

const actionCode = z.number().int()

const configSchema = z
  .object({
    getRequestsProtected: z.boolean().default(false),
    logDirectory: z.string().min(1),
    failedAuthAction: z
      .union([
        actionCode,
        z.object({ GET: actionCode.default(1), POST: actionCode.default(0) }).strict(),
      ])
      .default({ GET: 1, POST: 0 }),
    errorRedirectionPage: z.string().default('/'),
    customErrorMessage: z.string().default(''),
    jsResourceUrl: z.string().min(1),
    tokenLength: z.union([z.number(), z.string()]).optional(),
    disabledJsMessage: z.string().default(DEFAULT_DISABLED_JS_MESSAGE),
  })
  .strict()

type ConfigOverrides = Pick<CSRFProtectorOptions, 'getRequestsProtected' | 'tokenLength' | 'failedAuthAction'>

/**
 * Validate raw configuration and apply call-site overrides.
 *
 * `baseDir` anchors a relative `logDirectory`.
 *
 * @throws ConfigurationError when the input does not match the schema
 */
export function resolveConfig(
  input: unknown,
  overrides: ConfigOverrides = {},
  baseDir: string = process.cwd()
): ProtectorConfig {
  const parsed = configSchema.safeParse(input)
  if (!parsed.success) {
    throw new ConfigurationError('Invalid CSRFProtector configuration', {
      details: {
        issues: parsed.error.issues.map(issue => ({
          path: issue.path.join('.'),
          message: issue.message,
        })),
      },
    })
  }

  const raw = parsed.data

  let failedAuthAction =
    typeof raw.failedAuthAction === 'number'
      ? { GET: raw.failedAuthAction, POST: raw.failedAuthAction }
      : raw.failedAuthAction

  if (overrides.failedAuthAction !== undefined) {
    const code = Math.trunc(overrides.failedAuthAction)
    failedAuthAction = { GET: code, POST: code }
  }

  const config: ProtectorConfig = {
    getRequestsProtected: overrides.getRequestsProtected === true || raw.getRequestsProtected,
    logDirectory: isAbsolute(raw.logDirectory) ? raw.logDirectory : resolve(baseDir, raw.logDirectory),
    failedAuthAction: Object.freeze(failedAuthAction),
    errorRedirectionPage: raw.errorRedirectionPage,
    customErrorMessage: raw.customErrorMessage,
    jsResourceUrl: raw.jsResourceUrl,
    tokenLength: resolveTokenLength(overrides.tokenLength ?? raw.tokenLength),
    disabledJsMessage: raw.disabledJsMessage,
  }

  return Object.freeze(config)
}

/**
 * Read and resolve a JSON config file
 *
 * @throws ConfigurationError when the file is missing, unreadable or invalid
 */
export async function loadConfigFile(
  path: string,
  overrides: ConfigOverrides = {}
): Promise<ProtectorConfig> {
  const file = resolve(path)

  let text: string
  try {
    text = await readFile(file, 'utf8')
  } catch (error) {
    throw new ConfigurationError('configuration file not found for CSRFProtector!', {
      details: { file },
      cause: error,
    })
  }

  let input: unknown
  try {
    input = JSON.parse(text)
  } catch (error) {
    throw new ConfigurationError('CSRFProtector configuration file is not valid JSON', {
      details: { file },
      cause: error,
    })
  }

  return resolveConfig(input, overrides, dirname(file))
}

/**
 * Resolve configuration from options, `CSRF_PROTECTOR_CONFIG`, or the default file
 */
export async function loadConfig(
  source: ProtectorConfigInput | string | undefined,
  overrides: ConfigOverrides = {}
): Promise<ProtectorConfig> {
  if (source !== undefined && typeof source !== 'string') {
    return resolveConfig(source, overrides)
  }

  const path = source || process.env.CSRF_PROTECTOR_CONFIG || DEFAULT_CONFIG_FILE
  return loadConfigFile(path, overrides)
}

/**
 * Fail unless the log directory exists
 *
 * @throws ConfigurationError
 */
export async function assertLogDirectory(directory: string): Promise<void> {
  let isDirectory = false
  try {
    isDirectory = (await stat(directory)).isDirectory()
  } catch (error) {
    throw new ConfigurationError('Log Directory Not Found!', {
      details: { logDirectory: directory },
      cause: error,
    })
  }

  if (!isDirectory) {
    throw new ConfigurationError('Log Directory Not Found!', {
      details: { logDirectory: directory },
    })
  }
}
