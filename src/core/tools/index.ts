export { isValidToolName, ToolRegistry } from './registry';
export { compileArgumentSchema, compileArgumentShape, conformsTo } from './schema';
export {
  type ArgumentConstraints,
  type ArgumentField,
  type ArgumentSchema,
  type ArgumentType,
  defineTool,
  fail,
  type InferArguments,
  ok,
  type ToolContext,
  type ToolDescriptor,
  type ToolFailure,
  type ToolResult,
  type ToolSpec
} from './types';
