import {
  BadRequestException,
  Body,
  Controller,
  Delete,
  Get,
  Param,
  ParseEnumPipe,
  ParseIntPipe,
  ParseUUIDPipe,
  Patch,
  Post,
  Query,
  UploadedFile,
  UseInterceptors,
} from '@nestjs/common'
import { FileInterceptor } from '@nestjs/platform-express'

import { type Task, TaskStatus } from '../../../shared/database'
import { CreateTaskDto, UpdateTaskDto } from '../dto'
import { TasksService } from '../services'

const MAX_IMAGE_BYTES = 5 * 1024 * 1024

/**
 * Tasks Controller
 *
 * Endpoints:
 * - POST   /tasks            - Create a new task
 * - GET    /tasks            - List tasks (optional status / minimum priority)
 * - GET    /tasks/:id        - Get a specific task
 * - PATCH  /tasks/:id        - Update a task
 * - DELETE /tasks/:id        - Delete a task
 * - POST   /tasks/:id/image  - Attach an image (multipart field `image`)
 */
@Controller('tasks')
export class TasksController {
  constructor(private readonly tasksService: TasksService) {}

  /**
   * Example request:
   * POST /api/tasks
   * {
   *   "title": "Complete documentation",
   *   "description": "Write API docs for the tasks module",
   *   "priority": 5
   * }
   */
  @Post()
  async create(@Body() createTaskDto: CreateTaskDto): Promise<Task> {
    return this.tasksService.create(createTaskDto)
  }

  /**
   * Examples:
   * GET /api/tasks
   * GET /api/tasks?status=PENDING
   * GET /api/tasks?status=IN_PROGRESS&priority=3
   */
  @Get()
  async findAll(
    @Query('status', new ParseEnumPipe(TaskStatus, { optional: true })) status?: TaskStatus,
    @Query('priority', new ParseIntPipe({ optional: true })) priority?: number
  ): Promise<Task[]> {
    return this.tasksService.findAll({ status, minPriority: priority })
  }

  @Get(':id')
  async findOne(@Param('id', ParseUUIDPipe) id: string): Promise<Task> {
    return this.tasksService.findOne(id)
  }

  /**
   * Example request:
   * PATCH /api/tasks/7f0c5a4e-8a2b-4c1e-9d3f-2b6a1e0c9d11
   * { "status": "COMPLETED" }
   */
  @Patch(':id')
  async update(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() updateTaskDto: UpdateTaskDto
  ): Promise<Task> {
    return this.tasksService.update(id, updateTaskDto)
  }

  @Delete(':id')
  async remove(@Param('id', ParseUUIDPipe) id: string): Promise<Task> {
    return this.tasksService.remove(id)
  }

  @Post(':id/image')
  @UseInterceptors(FileInterceptor('image', { limits: { fileSize: MAX_IMAGE_BYTES } }))
  async attachImage(
    @Param('id', ParseUUIDPipe) id: string,
    @UploadedFile() file?: Express.Multer.File
  ): Promise<Task> {
    if (!file) {
      throw new BadRequestException('Multipart field "image" is required')
    }
    if (!file.mimetype.startsWith('image/')) {
      throw new BadRequestException(`Unsupported content type ${file.mimetype}`)
    }

    return this.tasksService.attachImage(id, {
      originalName: file.originalname,
      contentType: file.mimetype,
      body: file.buffer,
    })
  }
}
