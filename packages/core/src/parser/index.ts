export { parseTransactions, resolveTransactionType } from './transactions.js';
