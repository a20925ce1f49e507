/**
 * CLI Version Information
 *
 * Synchronized with package.json version.
 *
 * @module cli/version
 */

export const VERSION = '1.0.0';

export function getVersionInfo(): string {
  return `image-provisioner v${VERSION}`;
}
