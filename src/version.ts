/** Set when the image is built; empty in development. */
export const buildVersion: string = process.env.BUILD_VERSION ?? '';

export function resolveVersion(version: string = buildVersion): string {
  return version === '' ? 'undefined' : version;
}
