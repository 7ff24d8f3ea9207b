import type { UserRecord, UserUpdate } from "../types/user";
import type { ConnectionManager } from "./connectionManager";

export class UserNotFoundError extends Error {
  constructor(readonly userId: string) {
    super(`User ${userId} was not found.`);
    this.name = "UserNotFoundError";
  }
}

export class DuplicateUserIdError extends Error {
  constructor(readonly userId: string) {
    super(`User already exists for id ${userId}.`);
    this.name = "DuplicateUserIdError";
  }
}

export class UserValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UserValidationError";
  }
}

function cloneUser(user: UserRecord): UserRecord {
  const copy: UserRecord = { id: user.id, name: user.name, email: user.email };
  if (user.attributes) {
    copy.attributes = { ...user.attributes };
  }
  return copy;
}

function requirePresent(field: string, value: string): void {
  if (value.trim() === "") {
    throw new UserValidationError(`Missing or blank '${field}' field.`);
  }
}

export class UserRepository {
  constructor(private readonly connection: ConnectionManager<UserRecord>) {}

  createUser(id: string, name: string, email: string): UserRecord {
    const store = this.connection.getStore();

    requirePresent("id", id);
    requirePresent("name", name);
    requirePresent("email", email);

    if (store.has(id)) {
      throw new DuplicateUserIdError(id);
    }

    const user: UserRecord = { id, name, email };
    store.set(id, user);

    return cloneUser(user);
  }

  getUser(id: string): UserRecord {
    return cloneUser(this.findStored(id));
  }

  /** Applies only the fields present in `update`; everything else is kept. */
  updateUser(id: string, update: UserUpdate): UserRecord {
    const existing = this.findStored(id);

    if (update.name !== undefined) {
      requirePresent("name", update.name);
    }
    if (update.email !== undefined) {
      requirePresent("email", update.email);
    }

    const updated = cloneUser(existing);
    if (update.name !== undefined) {
      updated.name = update.name;
    }
    if (update.email !== undefined) {
      updated.email = update.email;
    }
    if (update.attributes !== undefined) {
      updated.attributes = { ...updated.attributes, ...update.attributes };
    }

    this.connection.getStore().set(id, updated);

    return cloneUser(updated);
  }

  /** Snapshot in insertion order. */
  listUsers(): UserRecord[] {
    return Array.from(this.connection.getStore().values(), cloneUser);
  }

  private findStored(id: string): UserRecord {
    const user = this.connection.getStore().get(id);

    if (!user) {
      throw new UserNotFoundError(id);
    }

    return user;
  }
}
