import { InvalidSenderError } from "../errors";
import type { CommandContext } from "../execution/context";
import type { CompiledExecutor } from "../registry/nodes";
import type { FlagValueType, ParameterDeclaration } from "./metadata";

type ParameterResolver = (context: CommandContext) => unknown;

function resolverFor(parameter: ParameterDeclaration): ParameterResolver {
  switch (parameter.kind) {
    case "context":
      return (context) => context;
    case "sender": {
      const required = parameter.require;
      if (required === "player" || required === "console") {
        return (context) => {
          if (context.sender.kind !== required) {
            throw new InvalidSenderError(required);
          }
          return context.sender;
        };
      }
      return (context) => context.sender;
    }
    case "arg": {
      const name = parameter.name;
      return (context) => context.args.get(name);
    }
    case "flag":
      return flagResolver(parameter.name, parameter.valueType ?? "boolean");
  }
}

function flagResolver(name: string, valueType: FlagValueType): ParameterResolver {
  switch (valueType) {
    case "boolean":
      return (context) => context.flags.isTruthy(name);
    case "integer":
      return (context) => context.flags.getInt(name);
    case "number":
      return (context) => context.flags.getNumber(name);
    case "string":
      return (context) => context.flags.value(name);
  }
}

/**
 * Builds the injection plan for a handler method once. The returned executor only
 * runs the plan's resolvers and calls the bound method.
 */
export function compileInvocation(
  method: Function,
  receiver: object,
  parameters: readonly ParameterDeclaration[],
): CompiledExecutor {
  const plan = parameters.map(resolverFor);
  const bound: Function = method.bind(receiver);
  return (context) => {
    const result: unknown = Reflect.apply(
      bound,
      undefined,
      plan.map((resolve) => resolve(context)),
    );
    if (result instanceof Promise) {
      return result.then((value: unknown) => value !== false);
    }
    return result !== false;
  };
}
