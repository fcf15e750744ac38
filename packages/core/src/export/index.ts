export { formatAccountsCsv, formatFailedCsv } from './csv.js';
