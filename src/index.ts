export type {
  Arity,
  CommandDescription,
  CommandNode,
  Grammar,
  ParseOutcome,
  Positional,
  PositionalDescription,
  RawArg,
  Switch,
  SwitchDescription,
  Token,
  ValueDescription,
  ValueParser,
  ValueType,
} from './types';
export {
  type CodegenOptions,
  GENERATED_END,
  GENERATED_START,
  generateTypes,
  type SyncStatus,
  spliceGenerated,
  syncGeneratedFile,
} from './core/codegen';
export { type Config, loadConfig, validateConfigFile } from './core/config';
export { GrammarSyntaxError, parseGrammarSource } from './core/dsl';
export {
  displayArg,
  FlagsError,
  type FlagsErrorDetail,
  type FlagsErrorKind,
  GrammarError,
} from './core/errors';
export { exitWithError, parseOrExit, reportError } from './core/exit';
export {
  commandPath,
  defineGrammar,
  findSubcommand,
  findSwitch,
  type GrammarOptions,
  resolveCommand,
  visibleSwitches,
} from './core/grammar';
export { renderHelp } from './core/help';
export { loadGrammarFile, parseGrammarJson } from './core/load';
export { type ParseResult, parseArgs, parseOrThrow } from './core/matcher';
export {
  commandNames,
  hasSwitch,
  leafOutcome,
  positionalValues,
  switchCount,
  switchValues,
  toFlags,
} from './core/materialize';
export { buildConfigJsonSchema, CommandDescriptionSchema } from './core/schema';
export { tokenize } from './core/tokenize';
export { BUILTIN_VALUE_TYPES, fromSchema } from './core/value-types';
