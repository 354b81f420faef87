// Argument repair rules
// Deterministic rewrites applied before retrying a ParameterInvalid failure

import type { ArgValue, FailureDetail, ToolArgs, ToolParameter, ToolSpec } from '../tools/types.js';
import { normalizeDate } from '../triage/dates.js';
import { entityValueFor } from './bindings.js';
import type { EntityBag } from './types.js';

export interface RepairOutcome {
  args: ToolArgs;
  changed: boolean;
  applied: string[]; // "<rule>:<param>"
}

type Rule = (param: ToolParameter, value: ArgValue | undefined, context: RuleContext) => ArgValue | null | undefined;

interface RuleContext {
  entities: EntityBag;
  failedParam?: string;
}

// undefined = rule does not apply, null = remove the argument
const rules: Array<{ name: string; apply: Rule }> = [
  {
    name: 'normalize-date',
    apply: (param, value) => {
      if (typeof value !== 'string' || !param.name.endsWith('_date')) return undefined;
      const normalized = normalizeDate(value);
      return normalized && normalized !== value ? normalized : undefined;
    },
  },
  {
    name: 'normalize-enum',
    apply: (param, value) => {
      if (!param.enum || value === undefined) return undefined;
      const text = String(value).trim().toLowerCase();
      if (param.enum.includes(String(value))) return undefined;
      const match =
        param.enum.find(option => option.toLowerCase() === text) ??
        param.enum.find(option => option.toLowerCase() === `${text}s` || `${option.toLowerCase()}s` === text);
      return match;
    },
  },
  {
    name: 'default-optional',
    apply: (param, value, { failedParam }) => {
      if (param.required || value === undefined || failedParam !== param.name) return undefined;
      if (param.default !== undefined) return param.default === value ? undefined : param.default;
      return null;
    },
  },
  {
    name: 'fill-from-entities',
    apply: (param, value, { entities }) => {
      if (value !== undefined && String(value).trim() !== '') return undefined;
      return entityValueFor(param, entities);
    },
  },
];

/**
 * Runs the rules over every non-target parameter; the first rule that
 * applies to a parameter wins. Parameters flagged as the call's target are
 * never touched.
 */
export function repairArguments(
  tool: ToolSpec,
  args: ToolArgs,
  failure: FailureDetail,
  entities: EntityBag,
): RepairOutcome {
  const repaired: ToolArgs = { ...args };
  const applied: string[] = [];
  const failedParam = typeof failure.context?.param === 'string' ? failure.context.param : undefined;

  for (const param of tool.parameters) {
    if (param.target) continue;

    for (const rule of rules) {
      const next = rule.apply(param, repaired[param.name], { entities, failedParam });
      if (next === undefined) continue;
      if (next === null) {
        delete repaired[param.name];
      } else {
        repaired[param.name] = next;
      }
      applied.push(`${rule.name}:${param.name}`);
      break;
    }
  }

  return { args: repaired, changed: !sameArgs(args, repaired), applied };
}

function sameArgs(a: ToolArgs, b: ToolArgs): boolean {
  const keys = Object.keys(a);
  return keys.length === Object.keys(b).length && keys.every(key => key in b && a[key] === b[key]);
}
