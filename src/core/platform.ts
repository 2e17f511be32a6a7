/**
 * Platform compatibility layer.
 *
 * Node.js version guard and upgrade hints shown by the CLI entry point.
 */

/** Detected platform. */
export type Platform = 'linux' | 'macos' | 'windows' | 'unknown';

/** Detect the current platform. */
export function detectPlatform(): Platform {
  switch (process.platform) {
    case 'linux': return 'linux';
    case 'darwin': return 'macos';
    case 'win32': return 'windows';
    default: return 'unknown';
  }
}

/** Minimum required Node.js major version. */
export const MINIMUM_NODE_MAJOR = 20;

/** Get Node.js version info. */
export function getNodeVersionInfo(version: string = process.version): {
  version: string;
  major: number;
  minor: number;
  patch: number;
  meetsMinimum: boolean;
} {
  const clean = version.replace('v', '');
  const [major = 0, minor = 0, patch = 0] = clean.split('.').map(Number);

  return {
    version: clean,
    major,
    minor,
    patch,
    meetsMinimum: major >= MINIMUM_NODE_MAJOR,
  };
}

/**
 * Get platform-specific Node.js upgrade instructions.
 */
export function getNodeUpgradeInstructions(platform: Platform = detectPlatform()): string[] {
  const instructions: string[] = [];
  switch (platform) {
    case 'macos':
      instructions.push(`brew install node@${MINIMUM_NODE_MAJOR}`);
      break;
    case 'windows':
      instructions.push(`winget install OpenJS.NodeJS.LTS`);
      break;
    default:
      break;
  }
  instructions.push(`nvm install ${MINIMUM_NODE_MAJOR} && nvm use ${MINIMUM_NODE_MAJOR}`);
  instructions.push(`https://nodejs.org/en/download/`);
  return instructions;
}
