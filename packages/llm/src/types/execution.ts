export type StepResult = {
  readonly stepType: string;
  readonly output: string;
  readonly success: boolean;
};

export type ExecutionResult = {
  readonly success: boolean;
  readonly finalResponse: string;
  readonly stepResults: ReadonlyArray<StepResult>;
};

export function stepSuccess(stepType: string, output: string): StepResult {
  return { stepType, output, success: true };
}

export function stepFailure(stepType: string, output: string): StepResult {
  return { stepType, output, success: false };
}
