export { purgeExpiredCredentials, type PurgeResult } from './purge.js';
