import type { User } from '../types/schemas.js';
import { NotFoundError, ValidationError } from './errors.js';

/**
 * Volatile registry of users keyed by id.
 *
 * Ids come from a counter that only moves forward, so a deleted id is never
 * handed out again for the lifetime of the instance. Map iteration order is
 * insertion order, which is what `list()` returns.
 *
 * Every method is synchronous; on Node's single thread that makes create and
 * delete atomic with respect to each other.
 */
export class UserStore {
  private users = new Map<number, User>();
  private nextId = 1;

  get size(): number {
    return this.users.size;
  }

  create(name: string | undefined, email: string | undefined): User {
    const cleanName = requireText(name);
    const cleanEmail = requireText(email);
    if (cleanName === null || cleanEmail === null) {
      throw new ValidationError();
    }

    const user: User = { id: this.nextId, name: cleanName, email: cleanEmail };
    this.users.set(user.id, user);
    this.nextId += 1;
    return { ...user };
  }

  get(id: number): User {
    const user = this.users.get(id);
    if (!user) {
      throw new NotFoundError();
    }
    return { ...user };
  }

  list(): User[] {
    return Array.from(this.users.values(), (user) => ({ ...user }));
  }

  delete(id: number): void {
    if (!this.users.delete(id)) {
      throw new NotFoundError();
    }
  }
}

// Trimmed value, or null when absent or blank.
function requireText(value: string | undefined): string | null {
  if (value === undefined) {
    return null;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}
