import {
  EdgeCheckSchema,
  EventLogSchema,
  StatsSchema,
  StatsTypeSchema,
  type EdgeCheck,
  type EventLog,
  type Stats,
  type StatsType,
} from '@edgeconf/types';
import { z } from 'zod';

import { apiPath } from '../form.js';
import type { FastlyTransport } from '../transport.js';

const URL_SCHEME_PATTERN = /^https?:\/\//;

export class EventLogReader {
  constructor(private readonly transport: FastlyTransport) {}

  async get(objectId: string): Promise<EventLog> {
    return this.transport.request(apiPath('event_log', objectId), EventLogSchema);
  }
}

export class StatsReader {
  constructor(private readonly transport: FastlyTransport) {}

  /**
   * Aggregated traffic statistics for the service
   */
  async get(serviceId: string, type: StatsType = 'all'): Promise<Stats> {
    const statsType = StatsTypeSchema.parse(type);
    return this.transport.request(apiPath('service', serviceId, 'stats', statsType), StatsSchema);
  }
}

export class ContentInspector {
  constructor(private readonly transport: FastlyTransport) {}

  /**
   * Headers and content hash of `url` as seen by each edge server.
   * The scheme is stripped; host and path are sent as-is.
   */
  async edgeCheck(url: string): Promise<EdgeCheck[]> {
    const target = url.replace(URL_SCHEME_PATTERN, '');
    return this.transport.request(`/content/edge_check/${target}`, z.array(EdgeCheckSchema));
  }
}
