import {
  IsEmail,
  IsEnum,
  IsNotEmpty,
  IsObject,
  IsOptional,
  IsString,
  Length,
  MaxLength,
} from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { ServiceType } from '../../core/domain/enums';

/**
 * DTO for submitting a job
 */
export class SubmitOrderDto {
  @ApiProperty({
    description: 'Kind of content to produce',
    enum: ServiceType,
    example: ServiceType.TRANSCRIPTION,
  })
  @IsEnum(ServiceType)
  serviceType!: ServiceType;

  @ApiProperty({
    description: 'Pipeline parameters for the chosen service type',
    example: {
      audioUrl: 'https://files.example.com/lecture-01.mp3',
      color: 'amethyst',
      columns: 'two',
      textOnly: false,
    },
  })
  @IsObject()
  parameters!: Record<string, unknown>;

  @ApiProperty({ description: 'Customer name', example: 'Ana Rojas', maxLength: 200 })
  @IsNotEmpty()
  @IsString()
  @MaxLength(200)
  customerName!: string;

  @ApiProperty({ description: 'Delivery address for the files', example: 'ana@example.com' })
  @IsEmail()
  customerEmail!: string;

  @ApiPropertyOptional({
    description: 'Payment gateway (defaults to the configured one)',
    example: 'mercadopago',
  })
  @IsOptional()
  @IsString()
  gateway?: string;

  @ApiPropertyOptional({ description: 'Discount code', example: 'WELCOME10' })
  @IsOptional()
  @IsString()
  @Length(1, 64)
  discountCode?: string;
}

export class SubmitOrderResponseDto {
  @ApiProperty({ example: '0b7f6c1e-2a59-4c4e-9d0f-0c1d2e3f4a5b' })
  orderId!: string;

  @ApiProperty({ example: 'https://www.mercadopago.cl/checkout/v1/redirect?pref_id=123' })
  checkoutUrl!: string;
}

/**
 * Query of the dashboard status poll
 */
export class OrderStatusQueryDto {
  @ApiPropertyOptional({
    description: 'Gateway token received on return, when the dashboard has one',
  })
  @IsOptional()
  @IsString()
  token?: string;
}

export class ListOrdersByEmailDto {
  @ApiProperty({ description: 'Customer email', example: 'ana@example.com' })
  @IsEmail()
  email!: string;
}
