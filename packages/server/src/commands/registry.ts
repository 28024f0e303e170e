// packages/server/src/commands/registry.ts

export type CommandCategory = 'general' | 'server' | 'admin';

export interface CommandDefinition {
  readonly name: string;
  readonly aliases: readonly string[];
  readonly description: string;
  readonly usage: string;
  readonly category: CommandCategory;
  /** Any one of these roles grants access */
  readonly requiredRoles?: readonly string[];
}

/** Who issued the command on the chat platform */
export interface CommandContext {
  readonly platform: string;
  readonly accountId: string;
  readonly senderName: string;
  readonly roles: readonly string[];
}

/** Text handed back to the chat platform */
export interface CommandResult {
  readonly content: string;
  /** Only the issuer should see it */
  readonly ephemeral: boolean;
}

export type CommandExecutor = (args: readonly string[], ctx: CommandContext) => Promise<CommandResult>;

export interface ParsedCommand {
  /** Lower-cased; may be an alias */
  readonly name: string;
  readonly args: readonly string[];
  readonly raw: string;
}

export interface RegisteredCommand {
  readonly definition: CommandDefinition;
  readonly executor: CommandExecutor;
}

export interface CommandRegistry {
  register(definition: CommandDefinition, executor: CommandExecutor): void;
  unregister(name: string): boolean;
  get(nameOrAlias: string): RegisteredCommand | undefined;
  list(): readonly CommandDefinition[];
  parse(content: string, prefix: string): ParsedCommand | null;
  execute(parsed: ParsedCommand, ctx: CommandContext): Promise<CommandResult>;
}

export function canRun(definition: CommandDefinition, roles: readonly string[]): boolean {
  const required = definition.requiredRoles ?? [];
  return required.length === 0 || required.some((role) => roles.includes(role));
}

/**
 * Commands keyed by name; aliases share one case-insensitive lookup table.
 * A name or alias can belong to one command only.
 */
export class InMemoryCommandRegistry implements CommandRegistry {
  private readonly commands = new Map<string, RegisteredCommand>();
  private readonly lookup = new Map<string, string>();

  register(definition: CommandDefinition, executor: CommandExecutor): void {
    const keys = [definition.name, ...definition.aliases].map((key) => key.toLowerCase());
    for (const key of keys) {
      const owner = this.lookup.get(key);
      if (owner !== undefined) {
        throw new Error(`Command name "${key}" is already used by ${owner}`);
      }
    }

    this.commands.set(definition.name, { definition, executor });
    for (const key of keys) {
      this.lookup.set(key, definition.name);
    }
  }

  unregister(name: string): boolean {
    const command = this.commands.get(name);
    if (!command) {
      return false;
    }
    for (const [key, owner] of this.lookup) {
      if (owner === name) {
        this.lookup.delete(key);
      }
    }
    this.commands.delete(name);
    return true;
  }

  get(nameOrAlias: string): RegisteredCommand | undefined {
    const name = this.lookup.get(nameOrAlias.toLowerCase());
    return name === undefined ? undefined : this.commands.get(name);
  }

  list(): readonly CommandDefinition[] {
    return Array.from(this.commands.values(), (command) => command.definition);
  }

  /** `<prefix><name> <args...>`; null when the prefix is missing or nothing follows it */
  parse(content: string, prefix: string): ParsedCommand | null {
    const raw = content.trim();
    if (!raw.startsWith(prefix)) {
      return null;
    }

    const [name, ...args] = raw.slice(prefix.length).trim().split(/\s+/);
    if (!name) {
      return null;
    }
    return { name: name.toLowerCase(), args, raw };
  }

  async execute(parsed: ParsedCommand, ctx: CommandContext): Promise<CommandResult> {
    const command = this.get(parsed.name);
    if (!command) {
      return { content: `Unknown command: ${parsed.name}. Try "help".`, ephemeral: true };
    }

    const { definition, executor } = command;
    if (!canRun(definition, ctx.roles)) {
      return { content: `Permission denied: ${definition.name} is for administrators only`, ephemeral: true };
    }

    try {
      return await executor(parsed.args, ctx);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return { content: `Command ${definition.name} failed: ${message}`, ephemeral: true };
    }
  }
}
