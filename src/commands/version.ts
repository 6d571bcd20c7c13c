/**
 * Version command.
 *
 * Outputs version information in JSON or human-readable format.
 */

import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

// Resolves to the repo root from both src/commands and dist/commands
const __dirname = path.dirname(fileURLToPath(import.meta.url));
const packageJsonPath = path.resolve(__dirname, '../../package.json');

function readPackageVersion(): string {
  const parsed: unknown = JSON.parse(fs.readFileSync(packageJsonPath, 'utf-8'));
  if (parsed && typeof parsed === 'object' && 'version' in parsed && typeof parsed.version === 'string') {
    return parsed.version;
  }
  return '0.0.0';
}

export const PACKAGE_VERSION = readPackageVersion();

export interface VersionOptions {
  json: boolean;
}

export interface VersionOutput {
  service_version: string;
  node: string;
  platform: string;
}

/**
 * Build version output object.
 */
export function getVersionInfo(): VersionOutput {
  return {
    service_version: PACKAGE_VERSION,
    node: process.version,
    platform: process.platform
  };
}

export function formatVersion(info: VersionOutput): string {
  return [
    `user-health-api v${info.service_version}`,
    `  Node: ${info.node}`,
    `  Platform: ${info.platform}`
  ].join('\n');
}

export async function versionCommand(options: VersionOptions): Promise<void> {
  const info = getVersionInfo();

  if (options.json) {
    console.log(JSON.stringify(info, null, 2));
  } else {
    console.log(formatVersion(info));
  }
}
