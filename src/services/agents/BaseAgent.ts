import type { Logger } from 'winston';
import { logger } from '../../config/logger';
import type {
  ActivityFilter,
  ActivityRecord,
  ActivityStatus,
  AgentStatus,
  AgentStatusReport,
  HandoffRecord,
} from '../../types/agents';
import { ReportWriter } from '../utility-validation/reporting/ReportWriter';

/**
 * Common behaviour for compliance agents: activity log, status tracking,
 * handoffs between agents and JSON report persistence.
 */
export abstract class BaseAgent<TInput, TResult> {
  readonly name: string;
  protected status: AgentStatus = 'initialized';
  protected readonly log: Logger;
  protected readonly clock: () => Date;
  private readonly activityLog: ActivityRecord[] = [];

  protected constructor(name: string, clock: () => Date = () => new Date()) {
    this.name = name;
    this.clock = clock;
    this.log = logger.child({ agent: name });
    this.log.info(`Agent '${name}' initialized`);
  }

  abstract run(input: TInput): Promise<TResult>;

  abstract getCapabilities(): string[];

  logActivity(
    activityType: string,
    status: ActivityStatus,
    details: Record<string, unknown> = {},
    errorMessage: string | null = null
  ): ActivityRecord {
    const activity: ActivityRecord = {
      agent_name: this.name,
      activity_type: activityType,
      status,
      timestamp: this.now(),
      details,
      error_message: errorMessage,
    };

    this.activityLog.push(activity);

    if (status === 'failed') {
      this.log.error(`Activity '${activityType}' failed: ${errorMessage ?? 'unknown error'}`);
    } else {
      this.log.info(`Activity '${activityType}' - Status: ${status}`);
    }

    return activity;
  }

  getActivityLog(filter: ActivityFilter = {}): ActivityRecord[] {
    return this.activityLog.filter(
      (activity) =>
        (!filter.activityType || activity.activity_type === filter.activityType) &&
        (!filter.status || activity.status === filter.status)
    );
  }

  handoff<T>(targetAgent: string, data: T, message = ''): HandoffRecord<T> {
    const record: HandoffRecord<T> = {
      from_agent: this.name,
      to_agent: targetAgent,
      timestamp: this.now(),
      message,
      data,
    };

    this.logActivity('handoff', 'completed', { target_agent: targetAgent, message });
    this.log.info(`Handoff prepared for agent '${targetAgent}'`);
    return record;
  }

  receiveHandoff<T>(handoff: HandoffRecord<T>): T {
    this.logActivity('receive_handoff', 'completed', {
      from_agent: handoff.from_agent,
      message: handoff.message,
    });

    this.log.info(`Received handoff from agent '${handoff.from_agent}'`);
    return handoff.data;
  }

  saveReport(data: unknown, outputPath: string): Promise<string> {
    return ReportWriter.writeJson(data, outputPath);
  }

  getStatus(): AgentStatusReport {
    return {
      agent_name: this.name,
      status: this.status,
      total_activities: this.activityLog.length,
      completed_activities: this.activityLog.filter((a) => a.status === 'completed').length,
      failed_activities: this.activityLog.filter((a) => a.status === 'failed').length,
      capabilities: this.getCapabilities(),
    };
  }

  protected now(): string {
    return this.clock().toISOString();
  }
}
