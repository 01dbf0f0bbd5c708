export { registerVersion } from './version.js';
export { registerInstall } from './install.js';
export { registerRetry } from './retry.js';
export { registerProfiles } from './profiles.js';
export { registerShow } from './show.js';
export { registerValidate } from './validate.js';
export { registerCacheStats } from './cache-stats.js';
export { registerDoctor } from './doctor.js';
export { registerConfig } from './config.js';
