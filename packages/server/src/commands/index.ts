// packages/server/src/commands/index.ts
export {
  canRun,
  InMemoryCommandRegistry,
  type CommandCategory,
  type CommandContext,
  type CommandDefinition,
  type CommandExecutor,
  type CommandRegistry,
  type CommandResult,
  type ParsedCommand,
  type RegisteredCommand,
} from './registry.js';
export {
  dispatchCommand,
  parseServerFlag,
  registerBuiltInCommands,
  selectServer,
  type CommandDeps,
  type CommandOptions,
  type ServerSelection,
} from './built-in.js';
export {
  describeQueryError,
  formatBindingNotice,
  formatForwardEvent,
  formatHelp,
  formatInfo,
  formatPlayer,
  formatPlayers,
  formatStatus,
  type InfoRow,
} from './formatter.js';
