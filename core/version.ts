import { readFileSync } from 'fs';
import { join } from 'path';

// Replaced with the package version when bundled
declare const __VERSION__: string;

function readPackageVersion(): string {
  try {
    const packageJson: unknown = JSON.parse(readFileSync(join(__dirname, '..', 'package.json'), 'utf-8'));
    if (
      typeof packageJson === 'object' &&
      packageJson !== null &&
      'version' in packageJson &&
      typeof packageJson.version === 'string'
    ) {
      return packageJson.version;
    }
  } catch (error) {
    console.warn('Failed to read version from package.json:', error);
  }
  return '0.0.0';
}

export const version: string = typeof __VERSION__ === 'string' ? __VERSION__ : readPackageVersion();
