import { IsInt, IsOptional, Matches, Min } from 'class-validator';

export const PROGRAM_DAY_REGEX = /^\d{4}-\d{2}-\d{2}$/;

export class ActivatePlanDto {
  @IsOptional()
  @IsInt()
  @Min(1)
  startDayIndex?: number;
}

export class RecordCompletionDto {
  @Matches(PROGRAM_DAY_REGEX, { message: 'date must be yyyy-MM-dd' })
  date!: string;
}
