export * from './common.js';
export * from './portfolio.js';
export * from './goal.js';
export * from './dca.js';
export * from './family.js';
export * from './funding.js';
export * from './stock.js';
export * from './user.js';
export * from './ai.js';
