/**
 * Argument parsing for the fetch and convert scripts
 */

export interface FetchArgs {
  url?: string;
  out?: string;
}

export interface ConvertArgs {
  /** Unset means the current Latest Pointer */
  pdfPath?: string;
  structuredOnly: boolean;
}

export class UsageError extends Error {}

function takeValue(args: string[], index: number, flag: string): string {
  const value = args[index + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new UsageError(`${flag} requires a value`);
  }
  return value;
}

/**
 * `[--url <url>] [--out <path>]`, also accepting `--url=<url>`
 */
export function parseFetchArgs(args: string[]): FetchArgs {
  const result: FetchArgs = {};
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const [flag, inline] = arg.includes('=') ? [arg.slice(0, arg.indexOf('=')), arg.slice(arg.indexOf('=') + 1)] : [arg, undefined];
    if (flag !== '--url' && flag !== '--out') {
      throw new UsageError(`Unknown argument: ${arg}`);
    }
    let value = inline;
    if (value === undefined) {
      value = takeValue(args, i, flag);
      i++;
    }
    if (flag === '--url') result.url = value;
    else result.out = value;
  }
  return result;
}

/**
 * `[<pdf>] [--structured]`
 */
export function parseConvertArgs(args: string[]): ConvertArgs {
  let pdfPath: string | undefined;
  let structuredOnly = false;
  for (const arg of args) {
    if (arg === '--structured') {
      structuredOnly = true;
    } else if (arg.startsWith('--')) {
      throw new UsageError(`Unknown argument: ${arg}`);
    } else if (pdfPath === undefined) {
      pdfPath = arg;
    } else {
      throw new UsageError(`Unexpected argument: ${arg}`);
    }
  }
  return { pdfPath, structuredOnly };
}
