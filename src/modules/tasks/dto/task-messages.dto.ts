import { IsUUID } from 'class-validator'

import { UpdateTaskDto } from './update-task.dto'

/**
 * Queue message types handled by the tasks module.
 *
 * Every message is an envelope `{ type, data }`; `data` is validated
 * against the DTO of its type before anything touches the database.
 */
export const TaskMessageType = {
  CREATE: 'create_task',
  UPDATE: 'update_task',
  DELETE: 'delete_task',
} as const

export type TaskMessageType = (typeof TaskMessageType)[keyof typeof TaskMessageType]

export class UpdateTaskMessageDto extends UpdateTaskDto {
  @IsUUID()
  id!: string
}

export class DeleteTaskMessageDto {
  @IsUUID()
  id!: string
}
