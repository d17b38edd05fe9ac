import { ValidationReport } from './types';

/** Thrown when a starting grid is malformed: bad shape, digit outside 1-9, or duplicate givens */
export class InvalidInputError extends Error {
  constructor(
    message: string,
    public readonly report: ValidationReport
  ) {
    super(message);
    this.name = 'InvalidInputError';
  }
}
