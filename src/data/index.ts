export { MonthTable } from './month-table';
export { TimezoneTable } from './timezone-table';
