import { ArrayMaxSize, IsArray, IsInt, IsNotEmpty, IsOptional, IsString, Matches, MaxLength, Min } from 'class-validator';
import { PROGRAM_DAY_REGEX } from '../../plan-progress/dto/plan-progress.dto';

export class CreateCycleDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(120)
  name!: string;

  @IsOptional()
  @IsArray()
  @ArrayMaxSize(50)
  @IsString({ each: true })
  planIds?: string[];
}

export class RenameCycleDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(120)
  name!: string;
}

export class AddCyclePlanDto {
  @IsString()
  @IsNotEmpty()
  planId!: string;

  @IsOptional()
  @IsString()
  @MaxLength(500)
  note?: string;
}

/** Positions are 0-based item orders. */
export class MoveCycleItemDto {
  @IsInt()
  @Min(0)
  from!: number;

  @IsInt()
  @Min(0)
  to!: number;
}

export class CycleCompletionDto {
  @Matches(PROGRAM_DAY_REGEX, { message: 'date must be yyyy-MM-dd' })
  date!: string;
}

/** Optional start position, both 0-based. Without one, existing progress is kept. */
export class ActivateCycleDto {
  @IsOptional()
  @IsInt()
  @Min(0)
  startItemIndex?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  startDayIndex?: number;
}
