/** Injection token for the UserExistenceCheck implementation */
export const USER_EXISTENCE_CHECK = Symbol('USER_EXISTENCE_CHECK');

/**
 * Narrow view of the external user directory needed by the task use cases.
 * Users are identified by positive integers; there is no foreign key between
 * tasks and users in the store.
 */
export interface UserExistenceCheck {
  /** True when the user is known to the directory and ACTIVE */
  existsAndActive(ownerId: number): Promise<boolean>;

  /** True when the user is known to the directory, whatever its status */
  exists(ownerId: number): Promise<boolean>;
}
