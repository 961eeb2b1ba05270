import { createLogger } from '@edgeconf/core';
import type { Version } from '@edgeconf/types';
import { z } from 'zod';

import type { FastlyClient } from '../fastly-client.js';

const logger = createLogger({ name: 'deploy-vcl' });

export const DeployVclOptionsSchema = z.object({
  serviceName: z.string().min(1),
  vclName: z.string().min(1),
  content: z.string().min(1, 'VCL content is empty'),
  /** Delete every custom VCL on the version before uploading */
  replaceExisting: z.boolean().default(false),
  /** Upload as an include file and leave the main VCL unchanged */
  includeOnly: z.boolean().default(false),
});
export type DeployVclOptions = z.input<typeof DeployVclOptionsSchema>;

export interface DeployVclResult {
  serviceId: string;
  /** The version that was activated */
  version: Version;
  cloned: boolean;
  uploaded: 'created' | 'updated';
  /** Files removed by `replaceExisting` */
  cleared: string[];
}

/**
 * Upload a VCL file to a service and activate it
 *
 * Finds the service by name, takes its latest version (cloning it if it is
 * locked or active), writes the file, makes it main unless `includeOnly`,
 * and activates. Nothing is rolled back on failure: a clone made before the
 * failing step stays behind as an inactive draft.
 */
export async function deployVcl(
  client: Pick<FastlyClient, 'services' | 'versions' | 'vcls'>,
  options: DeployVclOptions
): Promise<DeployVclResult> {
  const { serviceName, vclName, content, replaceExisting, includeOnly } =
    DeployVclOptionsSchema.parse(options);

  const service = await client.services.getByName(serviceName);
  const serviceId = service.id;

  const latest = await client.versions.getLatestVersion(serviceId);
  const { version: draft, cloned } = await client.versions.prepareMutable(serviceId, latest);

  const cleared = replaceExisting
    ? await client.versions.clearAllVcl(serviceId, draft.number)
    : [];

  const existing = replaceExisting ? [] : await client.vcls.list(serviceId, draft.number);
  let uploaded: DeployVclResult['uploaded'];
  if (existing.some((file) => file.name === vclName)) {
    await client.vcls.update(serviceId, draft.number, vclName, { content });
    uploaded = 'updated';
  } else {
    await client.vcls.create(serviceId, draft.number, { name: vclName, content });
    uploaded = 'created';
  }

  if (!includeOnly) {
    await client.vcls.setMain(serviceId, draft.number, vclName);
  }

  const version = await client.versions.activate(serviceId, draft);

  logger.info(
    { serviceId, version: version.number, vclName, cloned, uploaded, cleared: cleared.length },
    'VCL deployed'
  );

  return { serviceId, version, cloned, uploaded, cleared };
}
