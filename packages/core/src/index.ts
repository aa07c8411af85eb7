export * from './errors.js';
export * from './ports.js';
export * from './schemas.js';
export * from './supabase.types.js';
export * from './dispatcher.js';

export * from './games/types.js';
export * from './games/memoryMatch.js';
export * from './games/ticTacToe.js';
export * from './games/rockPaperScissors.js';
export * from './games/emojiCategories.js';

export * from './lib/keyedLock.js';
export * from './lib/scheduler.js';

export * from './session/session.js';
export * from './session/sessionRegistry.js';
export * from './session/challengeManager.js';
export * from './session/confirmationManager.js';
export * from './session/afkReaper.js';
