import type { UserRecord } from "../types/user";
import type { ConnectionManager } from "./connectionManager";
import { UserRepository } from "./userRepository";

// ---------------------------------------------------------------------------
// Scoped acquisition
//
// Connect, run the unit of work, disconnect on every exit path. The scope
// always ends disconnected, even when the manager was connected on entry.
// Results and errors from the work pass through untouched.
// ---------------------------------------------------------------------------

export function withConnection<TRecord, TResult>(
  manager: ConnectionManager<TRecord>,
  work: (manager: ConnectionManager<TRecord>) => TResult,
): TResult {
  manager.connect();
  try {
    return work(manager);
  } finally {
    manager.disconnect();
  }
}

export async function withConnectionAsync<TRecord, TResult>(
  manager: ConnectionManager<TRecord>,
  work: (manager: ConnectionManager<TRecord>) => Promise<TResult>,
): Promise<TResult> {
  manager.connect();
  try {
    return await work(manager);
  } finally {
    manager.disconnect();
  }
}

export function withUserRepository<TResult>(
  manager: ConnectionManager<UserRecord>,
  work: (repository: UserRepository) => TResult,
): TResult {
  return withConnection(manager, (connected) =>
    work(new UserRepository(connected)),
  );
}
