import { PUBLIC_INSTANCES } from '@jetstream-sync/env';

import { StreamSyncError } from '../errors';

export type SubscribeParams = {
  wantedCollections: readonly string[];
  wantedIdentities?: readonly string[];
  cursor?: number;
};

export function isPublicInstance(instance: string): boolean {
  return PUBLIC_INSTANCES.some((known) => known === instance);
}

/**
 * Builds `wss://<instance>/subscribe?...`. Multi-valued filters repeat their
 * key once per value; an unlisted instance is a configuration error.
 */
export function buildSubscribeUri(instance: string, params: SubscribeParams, scheme = 'wss'): string {
  if (!isPublicInstance(instance)) {
    throw new StreamSyncError('CONFIG_ERROR', `Instance ${instance} is not a public instance.`, {
      details: { instance, allowed: [...PUBLIC_INSTANCES] },
    });
  }

  const query = new URLSearchParams();
  for (const collection of params.wantedCollections) {
    query.append('wantedCollections', collection);
  }
  for (const identity of params.wantedIdentities ?? []) {
    query.append('wantedDids', identity);
  }
  if (params.cursor !== undefined) {
    query.append('cursor', String(params.cursor));
  }

  return `${scheme}://${instance}/subscribe?${query.toString()}`;
}
