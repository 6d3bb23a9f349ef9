export { RefreshTokenRepository } from './refresh-token-repository.js';
