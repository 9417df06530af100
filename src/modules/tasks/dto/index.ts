export * from './create-task.dto'
export * from './task-messages.dto'
export * from './update-task.dto'
