import { IsEnum, IsInt, IsOptional, Max, Min } from 'class-validator';
import { ExecutionMode } from '../../common/constants/execution-mode';

export class UpdateProfileDto {
  @IsOptional()
  @IsInt()
  @Min(0)
  @Max(23)
  dayTransitionHour?: number;

  @IsOptional()
  @IsEnum(ExecutionMode)
  executionMode?: ExecutionMode;
}
