import { Logger } from '../utils/logger';

/** The process operations used to switch accounts; injectable for tests. */
export type PrivilegeOps = Pick<NodeJS.Process, 'getuid' | 'setuid' | 'setgid'>;

export const DEFAULT_USER = 'nobody';

/**
 * Switch the process to `user` (and `group`, defaulting to the user name)
 * after privileged ports are bound.
 *
 * Only acts when running as root on a platform with setuid/setgid. The
 * group must change first: once the uid is dropped the gid can no longer
 * be changed. Failure is logged and the process keeps its current identity.
 *
 * @returns true when both ids were switched.
 */
export function dropPrivileges(
  user: string,
  group: string | null,
  logger: Logger,
  ops: PrivilegeOps = process,
): boolean {
  if (!ops.getuid || !ops.setuid || !ops.setgid) {
    logger.debug('Privilege dropping is not supported on this platform');
    return false;
  }
  if (ops.getuid() !== 0) {
    logger.debug('Not running as root, keeping current user');
    return false;
  }

  const targetGroup = group ?? user;
  try {
    ops.setgid(targetGroup);
  } catch (err) {
    logger.warn(`Failed to drop user privileges: could not set group "${targetGroup}"`, err);
    return false;
  }
  try {
    ops.setuid(user);
  } catch (err) {
    logger.warn(`Failed to drop user privileges: could not set user "${user}"`, err);
    return false;
  }

  logger.info(`Dropped privileges to ${user}:${targetGroup}`);
  return true;
}
