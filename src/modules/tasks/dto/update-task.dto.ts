import { IsEnum, IsInt, IsNotEmpty, IsOptional, IsString, Max, MaxLength, Min } from 'class-validator'

import { TaskStatus } from '../../../shared/database'

export class UpdateTaskDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  @IsOptional()
  title?: string

  @IsString()
  @MaxLength(2000)
  @IsOptional()
  description?: string

  @IsEnum(TaskStatus)
  @IsOptional()
  status?: TaskStatus

  @IsInt()
  @Min(0)
  @Max(10)
  @IsOptional()
  priority?: number
}
