// src/index.ts

// Parsing
export * from './parsers/timeParser.js';
export * from './parsers/subjectExtractor.js';

// Scheduling
export * from './utils/calendarDedup.js';
export * from './utils/eventWindow.js';
export * from './utils/eventScheduler.js';
export * from './utils/emailExtractor.js';

// Google collaborators
export * from './utils/inboxFetcher.js';
export * from './utils/calendarIntegration.js';
export * from './lib/googleAuth.js';

export * from './lib/errors.js';
export * from './lib/logger.js';
export * from './config/env.js';

export type * from './types/extraction.js';
export type * from './types/calendar.js';
export type * from './types/mail.js';
export type * from './types/scheduler.js';
