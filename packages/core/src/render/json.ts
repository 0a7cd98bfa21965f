/**
 * JSON reporter — collects every entity and prints one document once the
 * last remote phase completes. Arrival order does not matter.
 */

import { localStateCode, remoteStateCode } from '../entity/codes.js';
import type { Entity } from '../entity/shared.js';
import { summaryStatus, type SummaryStatus } from '../entity/status.js';
import type { StatusRenderer, TextSink } from './layout.js';

export interface EntitySummary {
  name: string;
  branch: string;
  path: string;
  local: string | null;
  remote: string | null;
  tracking: string | null;
  status: SummaryStatus | null;
}

export function summarizeEntity(entity: Entity): EntitySummary {
  const tracking = entity.trackingBranch();
  return {
    name: entity.name,
    branch: entity.label,
    path: entity.location,
    local: entity.localFacts ? localStateCode(entity.localFacts) : null,
    remote: entity.remoteFacts ? remoteStateCode(entity.remoteFacts) : null,
    tracking: tracking || null,
    status: summaryStatus(entity) ?? null,
  };
}

export class JsonReporter implements StatusRenderer {
  private readonly done = new Set<Entity>();
  private written = false;

  constructor(
    private readonly entities: readonly Entity[],
    private readonly sink: TextSink,
  ) {}

  async start(): Promise<void> {
    this.flushIfComplete();
  }

  onLocalComplete(): void {
    // nothing to show until the whole run is known
  }

  onRemoteComplete(entity: Entity): void {
    this.done.add(entity);
    this.flushIfComplete();
  }

  private flushIfComplete(): void {
    if (this.written || this.done.size < this.entities.length) return;
    this.written = true;
    this.sink.write(`${JSON.stringify(this.entities.map(summarizeEntity), null, 2)}\n`);
  }
}
