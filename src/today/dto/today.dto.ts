import { IsBoolean, IsInt, IsOptional, Max, Min } from 'class-validator';

export class ChangeDayDto {
  /** 1-based day within the active plan, or the cycle's current plan. */
  @IsInt()
  @Min(1)
  newDayIndex!: number;

  @IsOptional()
  @IsBoolean()
  skipAndAdvance?: boolean;
}

export class LogSetsDto {
  @IsInt()
  @Min(0)
  @Max(50)
  completedSetCount!: number;
}
