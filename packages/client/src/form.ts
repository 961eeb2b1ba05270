/**
 * Form body encoding for mutating requests
 *
 * The API takes `application/x-www-form-urlencoded` bodies. Only allow-listed
 * keys are sent, absent values are omitted rather than sent empty, and
 * booleans travel as "0"/"1".
 */

export type FormFields = Readonly<Record<string, unknown>>;

/**
 * Encode the allow-listed subset of `fields`, in allow-list order
 */
export function encodeForm(fields: FormFields, allowList: readonly string[]): URLSearchParams {
  const body = new URLSearchParams();

  for (const key of allowList) {
    const value = Object.hasOwn(fields, key) ? fields[key] : undefined;
    if (value === undefined || value === null) continue;

    if (typeof value === 'boolean') {
      body.append(key, value ? '1' : '0');
    } else if (typeof value === 'string' || typeof value === 'number') {
      body.append(key, String(value));
    } else {
      throw new TypeError(`Field "${key}" cannot be form-encoded (got ${typeof value})`);
    }
  }

  return body;
}

/**
 * Build an API path from raw segments, URI-encoding each one
 */
export function apiPath(...segments: (string | number)[]): string {
  return `/${segments.map((segment) => encodeURIComponent(String(segment))).join('/')}`;
}

/**
 * Path of a version-scoped collection or object
 */
export function versionPath(
  serviceId: string,
  versionNumber: number,
  ...rest: (string | number)[]
): string {
  return apiPath('service', serviceId, 'version', versionNumber, ...rest);
}
