import { IsEnum, IsInt, IsNotEmpty, IsOptional, IsString, Max, MaxLength, Min } from 'class-validator'

import { TaskStatus } from '../../../shared/database'

/**
 * Create Task DTO
 *
 * Shared by `POST /tasks` and the `create_task` queue message.
 */
export class CreateTaskDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  title!: string

  @IsString()
  @IsOptional()
  @MaxLength(2000)
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
