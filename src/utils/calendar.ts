import { format } from 'date-fns';

/** Server-local calendar date, YYYY-MM-DD */
export const toCalendarDate = (date: Date = new Date()): string => format(date, 'yyyy-MM-dd');
