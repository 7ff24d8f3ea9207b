import { vi, type Mock } from "vitest";

import {
  ConnectionManager,
  type ConnectionEventLogger,
} from "../services/connectionManager";
import { UserRepository } from "../services/userRepository";
import type { UserRecord } from "../types/user";

type BuildConnectedRepositoryArgs = {
  label?: string;
  connect?: boolean;
};

/**
 * A manager with a silenced logger and a repository over it. Connected
 * unless `connect: false` is passed.
 */
export function buildConnectedRepository(
  args: BuildConnectedRepositoryArgs = {},
): {
  manager: ConnectionManager<UserRecord>;
  repository: UserRepository;
  logger: Mock<ConnectionEventLogger>;
} {
  const logger = vi.fn<ConnectionEventLogger>();
  const manager = new ConnectionManager<UserRecord>({
    label: args.label || "test",
    logger,
  });

  if (args.connect !== false) {
    manager.connect();
  }

  return {
    manager,
    repository: new UserRepository(manager),
    logger,
  };
}
