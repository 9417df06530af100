import { PutObjectCommand, S3Client } from '@aws-sdk/client-s3'
import { Injectable, Logger, ServiceUnavailableException } from '@nestjs/common'
import { ConfigService } from '@nestjs/config'
import { randomUUID } from 'node:crypto'
import { extname } from 'node:path'

export interface UploadedObject {
  key: string
  url: string
}

export interface UploadInput {
  originalName: string
  contentType: string
  body: Buffer
}

/**
 * Storage Service
 *
 * Uploads task attachments to an S3-compatible bucket under a random key
 * and returns the public URL `{endpoint}/{bucket}/{key}`.
 * Disabled when STORAGE_BUCKET or credentials are missing.
 */
@Injectable()
export class StorageService {
  private readonly logger = new Logger(StorageService.name)
  private readonly client: S3Client | null
  private readonly bucket: string
  private readonly endpoint: string

  constructor(configService: ConfigService) {
    this.bucket = configService.get<string>('config.storage.bucket') ?? ''
    this.endpoint = (
      configService.get<string>('config.storage.endpoint') ?? 'https://storage.yandexcloud.net'
    ).replace(/\/+$/, '')

    const accessKeyId = configService.get<string>('config.storage.accessKeyId')
    const secretAccessKey = configService.get<string>('config.storage.secretAccessKey')

    this.client =
      this.bucket && accessKeyId && secretAccessKey
        ? new S3Client({
            region: configService.get<string>('config.storage.region') ?? 'ru-central1',
            endpoint: this.endpoint,
            forcePathStyle: true,
            credentials: { accessKeyId, secretAccessKey },
          })
        : null

    if (!this.client) {
      this.logger.warn('Object storage not configured, uploads disabled')
    }
  }

  isEnabled(): boolean {
    return this.client !== null
  }

  async upload(input: UploadInput): Promise<UploadedObject> {
    if (!this.client) {
      throw new ServiceUnavailableException('Object storage is not configured')
    }

    const extension = extname(input.originalName).toLowerCase()
    const key = `${randomUUID()}${extension}`

    await this.client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: key,
        Body: input.body,
        ContentType: input.contentType,
      })
    )

    const url = `${this.endpoint}/${this.bucket}/${key}`
    this.logger.log(`Uploaded ${input.originalName} to ${url}`)
    return { key, url }
  }
}
