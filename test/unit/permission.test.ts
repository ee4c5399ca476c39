import { describe, it, expect } from "vitest";
import {
  isEmptyPermission,
  Permission,
  permissionToString,
  type CommandPermission,
} from "../../src/command/permission.js";
import { makeSender, type TestSender } from "../helpers/fixtures.js";

describe("Permission", () => {
  it("renders a simple permission as its node", () => {
    expect(permissionToString(Permission.of("region.claim"))).toBe("region.claim");
  });

  it("renders a predicate by its key", () => {
    expect(permissionToString(Permission.predicate<TestSender>(() => true))).toBe("predicate");
    expect(permissionToString(Permission.predicate<TestSender>(() => true, "is-op"))).toBe("is-op");
  });

  it("joins alternatives and requirements", () => {
    const either = Permission.anyOf<TestSender>(Permission.of("a"), Permission.of("b"));
    const both = Permission.allOf<TestSender>(either, Permission.of("c"));

    expect(permissionToString(either)).toBe("a|b");
    expect(permissionToString(both)).toBe("a|b&c");
  });

  it("leaves empty parts out of compound permissions", () => {
    const either = Permission.anyOf<TestSender>(Permission.empty(), Permission.of("a"));
    expect(permissionToString(either)).toBe("a");
  });

  it("evaluates predicates against the sender", () => {
    const permission = Permission.predicate<TestSender>((sender) => sender.permissions.includes("op"));
    expect(permission.test(makeSender({ permissions: ["op"] }))).toBe(true);
    expect(permission.test(makeSender())).toBe(false);
  });

  it("copies the parts of a compound permission", () => {
    const parts = [Permission.of("a")];
    const either = Permission.anyOf<TestSender>(...parts);
    parts.push(Permission.of("b"));

    expect(either.permissions).toHaveLength(1);
  });
});

describe("isEmptyPermission", () => {
  const cases: Array<[string, CommandPermission<TestSender>, boolean]> = [
    ["the empty permission", Permission.empty(), true],
    ["an empty node", Permission.of(""), true],
    ["a compound of empty parts", Permission.allOf<TestSender>(Permission.empty()), true],
    ["a node", Permission.of("a"), false],
    ["a predicate", Permission.predicate<TestSender>(() => false), false],
  ];

  it.each(cases)("%s -> %s", (_label, permission, expected) => {
    expect(isEmptyPermission(permission)).toBe(expected);
  });
});
