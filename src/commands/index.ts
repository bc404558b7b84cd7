export { createCommand } from './create.js';
export { openCommand } from './open.js';
export { closeCommand } from './close.js';
export { unmountCommand } from './unmount.js';
export { keysCommand } from './keys.js';
export { sealCommand, unsealCommand } from './seal.js';
export { listCommand } from './list.js';
export { statusCommand } from './status.js';
export { recoverCommand } from './recover.js';
export { configCommand } from './config.js';
