// src/utils/eventScheduler.ts
import type { CalendarService } from '../types/calendar.js';
import type { MailService } from '../types/mail.js';
import type {
  RunOptions,
  ScheduleOptions,
  SchedulerReport,
  SkipReason,
} from '../types/scheduler.js';
import { SubjectExtractor } from '../parsers/subjectExtractor.js';
import { checkForDuplicate } from './calendarDedup.js';
import { buildEventWindow, toWallClock } from './eventWindow.js';
import { getSubject } from './emailExtractor.js';
import { describeError } from '../lib/errors.js';
import { silentLogger, type Logger } from '../lib/logger.js';

export interface EventSchedulerDeps {
  mail: MailService;
  calendar: CalendarService;
  extractor?: SubjectExtractor;
  logger?: Logger;
}

function describeSkip(reason: SkipReason): string {
  switch (reason.kind) {
    case 'FormatMismatch':
      return `subject does not match the confirmation template (${reason.reason})`;
    case 'ParseFailure':
      return `unable to parse time "${reason.input}"; expected one of: ${reason.formatsTried.join(', ')}`;
    case 'FetchFailure':
      return `${reason.operation} failed: ${reason.message}`;
    case 'DuplicateSkip':
      return `event "${reason.eventName}" already exists at ${reason.start}`;
  }
}

export function emptyReport(): SchedulerReport {
  return { considered: 0, created: 0, createdEvents: [], skipped: [] };
}

/**
 * Final line of every run, including runs that stop early
 */
export function completionMessage(report: SchedulerReport): string {
  return `Process completed. ${report.created} events were created.`;
}

/**
 * Creates calendar events from confirmation emails, one message at a time.
 * Every per-message failure becomes a skip; nothing aborts the batch.
 */
export class EventScheduler {
  private readonly mail: MailService;
  private readonly calendar: CalendarService;
  private readonly extractor: SubjectExtractor;
  private readonly log: Logger;

  constructor(deps: EventSchedulerDeps) {
    this.mail = deps.mail;
    this.calendar = deps.calendar;
    this.extractor = deps.extractor ?? new SubjectExtractor();
    this.log = (deps.logger ?? silentLogger).child({ component: 'scheduler' });
  }

  /**
   * List matching messages, then process them.
   * A listing failure ends the run with an aborted report.
   */
  async run(options: RunOptions): Promise<SchedulerReport> {
    let messageIds: string[];
    try {
      messageIds = await this.mail.listMessageIds(options.query, options.maxMessages);
    } catch (error) {
      const message = describeError(error);
      this.log.error({ query: options.query }, `An error occurred while fetching emails: ${message}`);
      const report: SchedulerReport = { ...emptyReport(), aborted: message };
      this.logCompletion(report);
      return report;
    }

    if (messageIds.length === 0) {
      this.log.warn(
        { query: options.query },
        'No messages found matching the query. Check that the subject in the search query is correct.'
      );
      const report = emptyReport();
      this.logCompletion(report);
      return report;
    }

    this.log.info(`Found ${messageIds.length} messages.`);
    return this.processMessages(messageIds, options);
  }

  /**
   * Process a bounded list of message IDs sequentially
   */
  async processMessages(messageIds: string[], options: ScheduleOptions): Promise<SchedulerReport> {
    const report = emptyReport();

    for (const messageId of messageIds) {
      report.considered++;
      const reason = await this.processMessage(messageId, options, report);
      if (reason) {
        report.skipped.push({ messageId, reason });
        this.log.warn({ messageId, kind: reason.kind }, `Skipping message: ${describeSkip(reason)}`);
      }
    }

    this.logCompletion(report);
    return report;
  }

  private logCompletion(report: SchedulerReport): void {
    this.log.info(
      { considered: report.considered, skipped: report.skipped.length },
      completionMessage(report)
    );
  }

  /**
   * @returns Why the message was skipped, or undefined when an event was created
   */
  private async processMessage(
    messageId: string,
    options: ScheduleOptions,
    report: SchedulerReport
  ): Promise<SkipReason | undefined> {
    let subject: string | undefined;
    try {
      subject = getSubject(await this.mail.getMessage(messageId));
    } catch (error) {
      return { kind: 'FetchFailure', operation: 'getMessage', message: describeError(error) };
    }

    if (subject === undefined) {
      return { kind: 'FormatMismatch', subject: '', reason: 'message has no Subject header' };
    }

    this.log.debug({ messageId, subject }, 'Subject line');

    const extraction = this.extractor.extract(subject);
    if (!extraction.ok) {
      return extraction.error;
    }

    const { eventName, eventTime } = extraction.details;
    this.log.info(
      { messageId, eventName, eventTime: toWallClock(eventTime) },
      'Extracted event details'
    );

    const window = buildEventWindow(eventTime, options.timeZone, options.durationMinutes);

    let duplicate: boolean;
    try {
      duplicate = await checkForDuplicate(this.calendar, eventName, window);
    } catch (error) {
      return { kind: 'FetchFailure', operation: 'listEvents', message: describeError(error) };
    }

    if (duplicate) {
      return { kind: 'DuplicateSkip', eventName, start: window.start };
    }

    try {
      const created = await this.calendar.insertEvent({
        summary: eventName,
        window,
        attendees: options.attendees,
      });

      report.created++;
      report.createdEvents.push({ messageId, eventId: created.id, htmlLink: created.htmlLink });
      this.log.info(
        { messageId, eventId: created.id },
        `Event created: ${created.htmlLink ?? created.id}`
      );
      return undefined;
    } catch (error) {
      return { kind: 'FetchFailure', operation: 'insertEvent', message: describeError(error) };
    }
  }
}
