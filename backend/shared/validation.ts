import { isCalendarDate } from "./date-utils";
import { ValidationError } from "./errors";

export function validateCalendarDate(value: string, field: string): void {
  if (!isCalendarDate(value)) {
    throw new ValidationError(`${field} must be a date in YYYY-MM-DD format`);
  }
}

export function validateDateRange(startDate: string, endDate: string): void {
  validateCalendarDate(startDate, "startDate");
  validateCalendarDate(endDate, "endDate");

  if (startDate > endDate) {
    throw new ValidationError("Start date must be before or equal to end date");
  }
}

export function validateEmail(email: string): void {
  const emailRegex = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
  if (!emailRegex.test(email)) {
    throw new ValidationError("Invalid email format");
  }
}

export function validateHours(hours: number, field: string): void {
  if (!Number.isFinite(hours) || hours < 0) {
    throw new ValidationError(`${field} must be a non-negative number`);
  }
}

export function validateRating(rating: number | null | undefined): void {
  if (rating === null || rating === undefined) {
    return;
  }
  if (!Number.isInteger(rating) || rating < 1 || rating > 5) {
    throw new ValidationError("rating must be an integer between 1 and 5");
  }
}
