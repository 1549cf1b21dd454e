import { ExitCodes, NixyError, errorMessage } from "./errors.js";
import { warn } from "./output.js";
import { restoreContext, type RollbackContext, type RollbackController } from "./rollback.js";

/** Handed to a transaction body so failures can say where they happened. */
export class TransactionProgress {
  private current = "starting";

  constructor(private readonly controller: RollbackController) {}

  step(name: string): void {
    this.current = name;
  }

  get currentStep(): string {
    return this.current;
  }

  /** Path the operation created; removed again on rollback. */
  created(path: string): void {
    this.controller.recordCreated(path);
  }

  /** Path the operation removed after backing it up; copied back on rollback. */
  removed(path: string, backupPath: string): void {
    this.controller.recordRemoved(path, backupPath);
  }
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

/**
 * Run `operation` with `context` armed on the controller. On success the
 * context is committed; on failure it is restored (unless an interrupt got to
 * it first) and the error is rethrown with the failing step attached.
 */
export async function runTransaction<T>(
  controller: RollbackController,
  context: RollbackContext,
  description: string,
  operation: (progress: TransactionProgress) => Promise<T>,
): Promise<T> {
  const progress = new TransactionProgress(controller);
  controller.arm(context);
  let result: T;
  try {
    result = await operation(progress);
  } catch (error) {
    const taken = controller.take();
    if (taken) {
      restoreContext(taken);
      warn(`${capitalize(description)} failed. Reverted changes.`);
    }
    const code = error instanceof NixyError ? error.code : ExitCodes.Failure;
    throw new NixyError(
      `Failed to ${description} (while ${progress.currentStep}): ${errorMessage(error)}`,
      code,
      { cause: error },
    );
  }
  controller.commit();
  return result;
}
