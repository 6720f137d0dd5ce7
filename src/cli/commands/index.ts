/**
 * CLI Commands - Public API
 */

export { executeAssumeRoleCommand, USAGE, type AssumeRoleCommandDeps } from './assume-role.js';
