export {
  AST_FORMAT,
  AST_FORMAT_VERSION,
  compileSource,
  deserializeDocument,
  deserializeProgram,
  serializeProgram,
  type AstDocument,
  type AstMetadata,
} from "./ast_json";
