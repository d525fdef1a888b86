export { parseDuration, isValidDuration } from './duration.js';
export {
  type CalendarDate,
  toCalendarDate,
  parseCalendarDate,
  addDays,
  dateRange,
} from './calendar.js';
export { ValidationError, validateQuery, validateQuerySet } from './validation.js';
export { getErrorMessage, describeTransportError, ConfigError } from './errors.js';
export { createLogger, setLogLevel, type Logger } from './logger.js';
