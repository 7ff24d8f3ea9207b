import { describe, expect, it } from "vitest";

import { NotConnectedError } from "../services/connectionManager";
import {
  DuplicateUserIdError,
  UserNotFoundError,
  UserRepository,
} from "../services/userRepository";
import { buildConnectedRepository } from "../test-utils/buildConnectedRepository";

describe("UserRepository with ConnectionManager", () => {
  it("loses users across a disconnect/connect cycle", () => {
    const { manager, repository, logger } = buildConnectedRepository({
      label: "flow",
    });

    repository.createUser("1", "Ada", "ada@x.com");
    expect(repository.getUser("1")).toEqual({
      id: "1",
      name: "Ada",
      email: "ada@x.com",
    });

    manager.disconnect();
    expect(() => repository.getUser("1")).toThrow(NotConnectedError);

    manager.connect();
    expect(() => repository.getUser("1")).toThrow(UserNotFoundError);

    expect(logger.mock.calls).toEqual([
      ["connection_opened", { connection: "flow" }],
      ["connection_closed", { connection: "flow", discarded_records: 1 }],
      ["connection_opened", { connection: "flow" }],
    ]);
  });

  it("shares one store between repositories over the same manager", () => {
    const { manager, repository } = buildConnectedRepository();
    const sameManagersRepository = new UserRepository(manager);
    const { repository: otherManagersRepository } = buildConnectedRepository();

    repository.createUser("1", "Ada", "ada@x.com");
    sameManagersRepository.updateUser("1", { name: "Ada Lovelace" });

    expect(repository.getUser("1").name).toBe("Ada Lovelace");
    expect(() => otherManagersRepository.getUser("1")).toThrow(
      UserNotFoundError,
    );
    expect(() =>
      sameManagersRepository.createUser("1", "Grace", "grace@x.com"),
    ).toThrow(DuplicateUserIdError);
  });

  it("keeps each failure kind distinct", () => {
    const { manager, repository } = buildConnectedRepository();
    repository.createUser("1", "Ada", "ada@x.com");

    const failures: string[] = [];
    const attempts = [
      () => repository.createUser("1", "Ada", "ada@x.com"),
      () => repository.getUser("2"),
      () => {
        manager.disconnect();
        return repository.getUser("1");
      },
    ];

    for (const attempt of attempts) {
      try {
        attempt();
      } catch (error) {
        failures.push(error instanceof Error ? error.name : "unknown");
      }
    }

    expect(failures).toEqual([
      "DuplicateUserIdError",
      "UserNotFoundError",
      "NotConnectedError",
    ]);
  });
});
