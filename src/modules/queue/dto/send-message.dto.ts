import {
  IsInt,
  IsNotEmpty,
  IsObject,
  IsOptional,
  IsString,
  Matches,
  Max,
  MaxLength,
  Min,
  Validate,
  ValidatorConstraint,
  ValidatorConstraintInterface,
} from 'class-validator'

import type { AttributeValue } from '../../../shared/messaging'

@ValidatorConstraint({ name: 'messageAttributes' })
class MessageAttributesConstraint implements ValidatorConstraintInterface {
  validate(value: unknown): boolean {
    if (!value || typeof value !== 'object' || Array.isArray(value)) {
      return false
    }
    return Object.values(value).every((attribute) =>
      ['string', 'number', 'boolean'].includes(typeof attribute)
    )
  }

  defaultMessage(): string {
    return 'attributes must map names to strings, numbers or booleans'
  }
}

/**
 * Send Message DTO
 *
 * Body of `POST /queue/messages`. The payload goes to the queue as JSON;
 * consumers expect `{ type, data }`.
 *
 * Example:
 * {
 *   "body": { "type": "create_task", "data": { "title": "Review queue metrics" } },
 *   "delaySeconds": 10
 * }
 */
export class SendMessageDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(80)
  @Matches(/^[a-zA-Z0-9_-]+$/)
  @IsOptional()
  queueName?: string

  @IsObject()
  body!: Record<string, unknown>

  @IsInt()
  @Min(0)
  @Max(900)
  @IsOptional()
  delaySeconds?: number

  @Validate(MessageAttributesConstraint)
  @IsOptional()
  attributes?: Record<string, AttributeValue>
}
