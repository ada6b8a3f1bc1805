import { type ErrorLogger, REGION_ENDPOINTS } from '@shared';

/**
 * Maps a configured region identifier to an S3 endpoint hostname.
 *
 * Returns null when no region is configured, so the client default applies.
 * Identifiers missing from the region table are used verbatim as the endpoint.
 */
export function resolveEndpoint(
  region: string | undefined,
  log?: ErrorLogger,
): string | null {
  if (region === undefined) {
    return null;
  }

  if (Object.hasOwn(REGION_ENDPOINTS, region)) {
    return REGION_ENDPOINTS[region].hostname;
  }

  log?.warning(
    `Region ${region} given but not found in the region to endpoint map. Will use it as an endpoint`,
  );
  return region;
}

/**
 * Returns the signing region for a known region identifier.
 */
export function resolveSigningRegion(
  region: string | undefined,
): string | undefined {
  if (region === undefined || !Object.hasOwn(REGION_ENDPOINTS, region)) {
    return undefined;
  }
  return REGION_ENDPOINTS[region].signingRegion;
}

/**
 * Turns an endpoint hostname into a URL the SDK accepts.
 */
export function toEndpointUrl(endpoint: string): string {
  return endpoint.includes('://') ? endpoint : `https://${endpoint}`;
}
