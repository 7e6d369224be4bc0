/** What the command line asked for; paths are as given, not yet resolved */
export type Command = { kind: "example"; dir: string } | { kind: "render"; infoPath: string };

/**
 * Read `[render] [info.json]` or `example [dir]` from the arguments after the script name.
 * A bare path means render.
 */
export function parseCommand(args: readonly string[]): Command {
  const [first, second] = args;
  switch (first?.trim()) {
    case "example":
      return { kind: "example", dir: second ?? "example" };
    case "render":
      return { kind: "render", infoPath: second ?? "info.json" };
    default:
      return { kind: "render", infoPath: first ?? "info.json" };
  }
}
