// services/activity.service.ts — Activity log writer
// Notified after an operation commits. Failures here never undo the operation.

import type { Database } from '../models/db.js';
import { activityLogs } from '../models/schema.js';
import { createServiceLogger } from '../config/logger.js';
import type { ActivityEvent } from '../types/index.js';

const log = createServiceLogger('activity');

export interface ActivityRecorder {
  record(event: ActivityEvent): Promise<void>;
}

/**
 * Persists every event to the `activity_logs` table, keyed by the request id
 * so that a row can be traced back to the HTTP request that produced it.
 */
export class DrizzleActivityRecorder implements ActivityRecorder {
  constructor(private readonly db: Database) {}

  async record(event: ActivityEvent): Promise<void> {
    await this.db.insert(activityLogs).values({
      userId: event.userId,
      activityType: event.activityType,
      entityType: event.entityType,
      entityId: event.entityId,
      description: event.description,
      requestId: event.requestId,
    });

    log.debug(
      {
        activityType: event.activityType,
        entityType: event.entityType,
        entityId: event.entityId,
        userId: event.userId,
        requestId: event.requestId,
      },
      'Activity recorded'
    );
  }
}
