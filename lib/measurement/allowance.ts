import type { AllowanceRule } from "./schema";

/**
 * Read the two deduction magnitudes out of an allowance string such as "-5 x 4".
 * Digit runs only: a leading "-" is notation, not a sign. One number applies to
 * both sides; none means no deduction.
 *
 * The second number is the length deduction unless `swap` is set, so "-5 x 4"
 * takes 4 cm off the length and 5 cm off the height.
 */
export function parseAllowance(text: string, swap: boolean = false): AllowanceRule {
  const numbers = (text ?? "").match(/\d+/g)?.map((run) => Number.parseInt(run, 10)) ?? [];
  const first = numbers[0] ?? 0;
  const second = numbers[1] ?? first;
  return swap
    ? { lengthDeduction: first, heightDeduction: second }
    : { lengthDeduction: second, heightDeduction: first };
}

export const NO_ALLOWANCE: AllowanceRule = Object.freeze({ lengthDeduction: 0, heightDeduction: 0 });
