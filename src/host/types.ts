export type SenderKind = "player" | "console";

/** Identity handle supplied by the host for every invocation and completion request. */
export type CommandSender = {
  id: string;
  name: string;
  kind: SenderKind;
  hasPermission(permission: string): boolean;
  sendMessage(message: string): void;
};

export type HostActor = {
  id: string;
  name: string;
  world?: string;
};

export type HostWorld = {
  name: string;
  environment?: string;
};

/** Live lookups the domain argument types read from. */
export type HostDirectory = {
  onlineActors(): readonly HostActor[];
  worlds(): readonly HostWorld[];
};

export const EMPTY_DIRECTORY: HostDirectory = {
  onlineActors: () => [],
  worlds: () => [],
};
