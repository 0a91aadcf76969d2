export type ValidationLevel = 'CRITICAL' | 'WARNING';

export interface ValidationError {
  field: string;
  message: string;
  level?: ValidationLevel;
}

export interface ValidationWarning {
  field: string;
  message: string;
  level?: ValidationLevel;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
  warnings: ValidationWarning[];
}
