import { ApiProperty } from '@nestjs/swagger';
import { DispatchOutcome } from '../../core/domain/enums';

/**
 * Response to a gateway notification. Always returned with 200 so the
 * gateway stops retrying.
 */
export class WebhookResponseDto {
  @ApiProperty({ example: true })
  received!: true;

  @ApiProperty({
    description: 'What the router did with the notification',
    enum: DispatchOutcome,
    example: DispatchOutcome.SCHEDULED,
  })
  outcome!: DispatchOutcome;
}
