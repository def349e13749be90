export {
  parseDate, formatDate, addDays, startOfDay,
  todayString, isCalendarDate, toDate, daysBetween,
} from './date-parser.js';
