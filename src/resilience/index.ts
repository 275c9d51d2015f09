export * from './circuit-breaker.js';
export * from './cooldowns.js';
export * from './rate-limiter.js';
export * from './loop-detector.js';
export * from './diagnostic-monitor.js';
export * from './config-healer.js';
export * from './resilient-caller.js';
export * from './state.js';
