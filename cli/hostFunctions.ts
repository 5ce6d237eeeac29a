import { toDisplayString } from "../dsl/values.ts";
import { fail, succeed, type HostFunction } from "../runtime/dispatcher.ts";

const MIN_LENGTH = 12;

/** Rates a password by length and character variety. */
export function ratePassword(password: string): "weak" | "fair" | "strong" {
  const classes = [/[a-z]/, /[A-Z]/, /[0-9]/, /[^A-Za-z0-9]/].filter(
    (pattern) => pattern.test(password),
  ).length;

  if (password.length >= MIN_LENGTH * 1.5) return "strong";
  if (password.length >= MIN_LENGTH && classes >= 3) return "strong";
  if (password.length >= MIN_LENGTH || classes >= 3) return "fair";
  return "weak";
}

/** Host functions the `play` command registers for the sample scripts. */
export const demoFunctions: Record<string, HostFunction> = {
  getUserInput: (context) => {
    const input = context.input?.trim();
    return input ? [input] : [];
  },

  getCurrentTime: () => [new Date().toLocaleTimeString()],

  rememberName: (context) => {
    const name = toDisplayString(context.get("input")).trim();
    if (!name) {
      return fail("no name has been entered");
    }
    context.setGlobal("user_name", name);
    return succeed(`Nice to meet you, ${name}.`);
  },

  countAttempt: (context) => {
    const attempts = Number(context.get("attempts"));
    return [Number.isFinite(attempts) ? attempts + 1 : 1];
  },

  analyzePassword: (context) => {
    const password = context.input;
    if (password === undefined || password.length === 0) {
      return [];
    }

    switch (ratePassword(password)) {
      case "strong":
        return [
          "That is a strong password.",
          "passwords.bdl:start",
        ];
      case "fair":
        return [
          `That password is fair. Aim for ${MIN_LENGTH * 1.5} characters or more.`,
          "passwords.bdl:check_intro",
        ];
      case "weak":
        return [
          `That password is weak. Use at least ${MIN_LENGTH} characters.`,
          "passwords.bdl:check_intro",
        ];
    }
  },
};
