// Licensed under the Hungry Ghost Hive License. See LICENSE.

export { authCommand } from './auth.js';
export { configCommand } from './config.js';
export { fieldCommand } from './field.js';
export { initCommand } from './init.js';
export { issueCommand } from './issue.js';
