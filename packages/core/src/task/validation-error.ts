/** Which construction rule a task failed, in evaluation order */
export type ValidationRule =
  | 'empty-title'
  | 'invalid-due-date'
  | 'past-due-date'
  | 'priority-out-of-range';

export const ValidationMessage: Record<ValidationRule, string> = {
  'empty-title': 'Title must not be empty or whitespace',
  'invalid-due-date': 'Due date must be a valid date (yyyy-MM-dd)',
  'past-due-date': 'Due date must not be in the past',
  'priority-out-of-range': 'Priority must be an integer between 1 and 5',
};

export class ValidationError extends Error {
  readonly rule: ValidationRule;

  constructor(rule: ValidationRule) {
    super(ValidationMessage[rule]);
    this.name = 'ValidationError';
    this.rule = rule;
  }
}
