/**
 * Step builders shared by the recipes
 */

import type { ConfigMutation, PipeStep, RunStep } from '@sandbox-provision/engine';

export const IDMAP_KEY = 'lxc.idmap';

/**
 * Map container root and the default container user (uid/gid 1000) so the
 * user shares files with the invoking host user.
 */
export const USER_IDMAP = [
  'u 0 100000 1000',
  'g 0 100000 1000',
  'u 1000 1000 1',
  'g 1000 1000 1',
  'u 1001 101001 64535',
  'g 1001 101001 64535',
];

export function idmapConfiguration(): ConfigMutation[] {
  return [
    { type: 'clear', key: IDMAP_KEY },
    ...USER_IDMAP.map((value): ConfigMutation => ({ type: 'append', key: IDMAP_KEY, value })),
  ];
}

export function run(description: string, command: string[]): RunStep {
  return { type: 'run', description, command };
}

export function pipe(description: string, hostCommand: string[], command: string[]): PipeStep {
  return { type: 'pipe', description, hostCommand, command };
}

/**
 * Command run through a login shell of `user`
 */
export function asUser(user: string, script: string): string[] {
  return ['su', '-', user, '-c', script];
}

/**
 * Host command printing `text` verbatim, for piping into the sandbox
 */
export function emit(text: string): string[] {
  return ['printf', '%s', text];
}

/**
 * Pipe `contents` into `target` inside the sandbox, as `user` or root
 */
export function writeFileStep(description: string, target: string, contents: string, user?: string): PipeStep {
  const script = `cat > ${target}`;
  return pipe(description, emit(contents), user ? asUser(user, script) : ['sh', '-c', script]);
}

export function aptUpdate(): RunStep {
  return run('Updating apt', ['apt-get', 'update']);
}

export function aptInstall(description: string, packages: string[], flags: string[] = []): RunStep {
  return run(description, ['apt-get', 'install', ...flags, '-y', ...packages]);
}

/**
 * System-wide pip install; Debian marks its Python as externally managed
 */
export function pipInstall(packages: string[]): RunStep {
  return run('Installing python packages', ['pip3', 'install', '--break-system-packages', ...packages]);
}

/**
 * `Acme User` for prefix `acme`
 */
export function userFullName(prefix: string): string {
  return `${prefix.charAt(0).toUpperCase()}${prefix.slice(1).toLowerCase()} User`;
}

export function addUser(user: string, fullName: string): RunStep {
  return run('Adding user', ['adduser', '--disabled-password', '--gecos', fullName, user]);
}

/**
 * Set a password without putting it on any command line inside the sandbox
 */
export function setPassword(user: string, password: string): PipeStep {
  return pipe('Setting user password', ['printf', '%s\\n', `${user}:${password}`], ['chpasswd']);
}
