/**
 * Environment Detection
 *
 * Utilities for detecting the runtime environment (CI, headless, etc.).
 * Used by the logger to pick colored or plain output.
 */

/**
 * CI environment variable names to check.
 */
const CI_ENV_VARS = [
    'CI',
    'CONTINUOUS_INTEGRATION',
    'GITHUB_ACTIONS',
    'GITLAB_CI',
    'CIRCLECI',
    'BUILDKITE',
    'JENKINS_URL',
    'TF_BUILD',
];

/**
 * Detect if running in a CI/headless environment.
 *
 * Checks for:
 * - WEFT_HEADLESS=true environment variable
 * - Common CI environment variables
 * - No TTY on stderr (where log lines go)
 */
export function isCi(env: NodeJS.ProcessEnv = process.env): boolean {

    if (env['WEFT_HEADLESS'] === 'true') {

        return true;

    }

    for (const envVar of CI_ENV_VARS) {

        if (env[envVar]) {

            return true;

        }

    }

    return !process.stderr.isTTY;

}

/**
 * Check if running in development mode.
 *
 * @returns true if NODE_ENV is 'development' or WEFT_DEV is set
 */
export function isDev(env: NodeJS.ProcessEnv = process.env): boolean {

    return env['NODE_ENV'] === 'development' || env['WEFT_DEV'] === 'true';

}

/**
 * Check if debug event tracing is enabled.
 *
 * @returns true if WEFT_DEBUG is set
 */
export function isDebug(env: NodeJS.ProcessEnv = process.env): boolean {

    return env['WEFT_DEBUG'] === 'true';

}
