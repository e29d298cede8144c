import { EXIT_CODES } from "../../constant.js";
import { TrackerError } from "./TrackerError.js";

/**
 * Every problem found in the command line options, reported at once
 */
export class ValidationError extends TrackerError {
  public name = "ValidationError";
  public exitCode = EXIT_CODES.INVALID_OPTIONS;

  public constructor(public readonly problems: string[]) {
    super(
      ["Invalid options:", ...problems.map((problem) => `  - ${problem}`)].join("\n"),
      "INVALID_OPTIONS",
      "options",
      problems.map((problem) => ({ code: "INVALID_OPTION", message: problem })),
    );
  }

  public static fromErrors(errors: string[]): ValidationError {
    return new ValidationError(errors);
  }
}
