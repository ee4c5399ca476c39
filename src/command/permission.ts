export interface SimplePermission {
  readonly kind: "simple";
  readonly permission: string;
}

export interface PredicatePermission<C> {
  readonly kind: "predicate";
  readonly key: string;
  test(sender: C): boolean;
}

export interface OrPermission<C> {
  readonly kind: "or";
  readonly permissions: readonly CommandPermission<C>[];
}

export interface AndPermission<C> {
  readonly kind: "and";
  readonly permissions: readonly CommandPermission<C>[];
}

export type CommandPermission<C> =
  | SimplePermission
  | PredicatePermission<C>
  | OrPermission<C>
  | AndPermission<C>;

const EMPTY: SimplePermission = { kind: "simple", permission: "" };

export const Permission = {
  empty: (): SimplePermission => EMPTY,
  of: (permission: string): SimplePermission => ({ kind: "simple", permission }),
  predicate: <C>(test: (sender: C) => boolean, key = "predicate"): PredicatePermission<C> => ({
    kind: "predicate",
    key,
    test,
  }),
  anyOf: <C>(...permissions: CommandPermission<C>[]): OrPermission<C> => ({
    kind: "or",
    permissions: [...permissions],
  }),
  allOf: <C>(...permissions: CommandPermission<C>[]): AndPermission<C> => ({
    kind: "and",
    permissions: [...permissions],
  }),
};

export function permissionToString<C>(permission: CommandPermission<C>): string {
  switch (permission.kind) {
    case "simple":
      return permission.permission;
    case "predicate":
      return permission.key;
    case "or":
      return permission.permissions.map((p) => permissionToString(p)).filter(Boolean).join("|");
    case "and":
      return permission.permissions.map((p) => permissionToString(p)).filter(Boolean).join("&");
  }
}

/** True when the permission renders to nothing, i.e. it requires nothing. */
export function isEmptyPermission<C>(permission: CommandPermission<C>): boolean {
  return permissionToString(permission).length === 0;
}
