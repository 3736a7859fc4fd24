// ReAct Output Parser
// Reads FINAL ANSWER and ACTION: tool(arg, ...) directives out of free model text

import type { ParsedAction, ParseOutcome } from './types.js';

const FINAL_ANSWER_MARKER = /FINAL\s+ANSWER\s*:?/i;
const ACTION_MARKER = /\bACTION\s*:\s*/i;
const IDENTIFIER = /^([A-Za-z_][A-Za-z0-9_]*)\s*\(/;

/** Text after the first FINAL ANSWER marker, trimmed, or null when there is no marker. */
export function extractFinalAnswer(text: string): string | null {
  const match = FINAL_ANSWER_MARKER.exec(text);
  if (!match) return null;
  return text.slice(match.index + match[0].length).trim();
}

function isQuote(char: string): boolean {
  return char === '"' || char === "'";
}

function stripQuotes(value: string): string {
  if (value.length >= 2) {
    const first = value[0];
    const last = value[value.length - 1];
    if (isQuote(first) && first === last) {
      return value.slice(1, -1);
    }
  }
  return value;
}

// A quote at one end of an argument must be matched by the same quote at the other end
function hasUnmatchedQuote(value: string): boolean {
  const first = value[0];
  const last = value[value.length - 1];
  if (value.length < 2) return isQuote(first);
  return (isQuote(first) || isQuote(last)) && first !== last;
}

// Commas always split: the protocol has no escaping, so an argument cannot contain one
function splitArgs(argList: string): string[] | null {
  if (argList.trim() === '') return [];

  const args: string[] = [];
  for (const segment of argList.split(',')) {
    const trimmed = segment.trim();
    if (!trimmed || hasUnmatchedQuote(trimmed)) return null;
    args.push(stripQuotes(trimmed));
  }
  return args;
}

// Parentheses inside a quoted argument do not count; a quote only opens at the start of an argument
function closingParen(text: string, open: number): number {
  let depth = 0;
  let quote: string | null = null;
  let argStart = false;

  for (let i = open; i < text.length; i++) {
    const char = text[i];
    if (quote) {
      if (char === quote) quote = null;
      continue;
    }

    if (char === '(' || char === ',') {
      if (char === '(') depth++;
      argStart = true;
    } else if (char === ')') {
      depth--;
      if (depth === 0) return i;
      argStart = false;
    } else if (isQuote(char) && argStart) {
      quote = char;
      argStart = false;
    } else if (!/\s/.test(char)) {
      argStart = false;
    }
  }
  return -1;
}

/**
 * Parses the first line carrying an ACTION marker. A malformed call on that
 * line yields null; later lines are not consulted.
 */
export function parseAction(text: string): ParsedAction | null {
  const line = text.split(/\r?\n/).find(l => ACTION_MARKER.test(l));
  if (!line) return null;

  const marker = ACTION_MARKER.exec(line);
  if (!marker) return null;

  const call = line.slice(marker.index + marker[0].length);
  const head = IDENTIFIER.exec(call);
  if (!head) return null;

  const open = head[0].length - 1;
  const close = closingParen(call, open);
  if (close < 0) return null;

  const args = splitArgs(call.slice(open + 1, close));
  if (!args) return null;

  return { tool: head[1].toLowerCase(), args };
}

/** Termination wins over an action in the same output. */
export function parseModelOutput(text: string): ParseOutcome {
  const answer = extractFinalAnswer(text);
  if (answer !== null) {
    return { kind: 'final', answer };
  }

  const action = parseAction(text);
  if (action) {
    return { kind: 'action', ...action };
  }

  return { kind: 'none' };
}
