export { stripBom, normalizeCsvText } from './csv.js';
export { toMoney, normalizeAmount, formatMoney } from './money.js';
