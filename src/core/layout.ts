/**
 * Canonical entry names inside the staging area (and therefore the bundle).
 * The runtime entrypoint and runtime configuration rely on these names.
 */
export const PLAYBOOK_FILE = 'playbook.yml'
export const ROLES_DIR = 'roles'
export const REQUIREMENTS_FILE = 'requirements.yml'
export const VARS_FILE = 'vars.yml'
export const RUNTIME_CONFIG_FILE = 'ansible.cfg'
export const EXTERNAL_ROLES_DIR = 'external_roles'
export const RUNTIME_REQUIREMENTS_FILE = 'requirements.txt'
export const ENTRYPOINT_FILE = 'run.sh'

export const RESERVED_NAMES: ReadonlySet<string> = new Set([
  PLAYBOOK_FILE,
  ROLES_DIR,
  REQUIREMENTS_FILE,
  VARS_FILE,
  RUNTIME_CONFIG_FILE,
  EXTERNAL_ROLES_DIR,
  RUNTIME_REQUIREMENTS_FILE,
  ENTRYPOINT_FILE
])
