import { FieldViolation, ValidationError } from '../../shared/errors/domain.errors';

/**
 * Collects field violations so a value object reports every bad field at
 * once instead of the first one only.
 */
export class FieldChecker {
  private readonly violations: FieldViolation[] = [];

  requireText(field: string, value: string | undefined | null): string {
    const trimmed = value?.trim() ?? '';
    if (trimmed.length === 0) {
      this.violations.push({ field, message: `${field} is required` });
    }
    return trimmed;
  }

  optionalText(value: string | undefined | null): string | undefined {
    const trimmed = value?.trim() ?? '';
    return trimmed.length > 0 ? trimmed : undefined;
  }

  check(condition: boolean, field: string, message: string): void {
    if (!condition) {
      this.violations.push({ field, message });
    }
  }

  hasViolation(field: string): boolean {
    return this.violations.some((v) => v.field === field);
  }

  throwIfInvalid(subject: string): void {
    if (this.violations.length > 0) {
      throw new ValidationError(`Invalid ${subject}`, [...this.violations]);
    }
  }
}
