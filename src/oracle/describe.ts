import type { OracleArguments, OracleValue } from "../workload/descriptor";

const HEADER = "====================== Operation ======================";
const FOOTER = "=======================================================";

function formatValue(value: OracleValue): string {
  return Array.isArray(value) ? `[${value.join(", ")}]` : String(value);
}

/** Lines of the human-readable block printed before each verbose query. */
export function describeWorkload(args: OracleArguments): string[] {
  return [
    HEADER,
    ...Object.entries(args).map(
      ([key, value]) => `\t${key} = ${formatValue(value)}`,
    ),
    FOOTER,
  ];
}
