import {
  IsBoolean,
  IsDateString,
  IsEnum,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Length,
  Max,
  Min,
} from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { OrderStatus, ServiceType } from '../../core/domain/enums';

export class RetryOrderDto {
  @ApiPropertyOptional({
    description: 'Bypass the attempt limit',
    default: false,
  })
  @IsOptional()
  @IsBoolean()
  force?: boolean;

  @ApiPropertyOptional({ description: 'Operator recorded in the audit log', example: 'ops@example.com' })
  @IsOptional()
  @IsString()
  actor?: string;
}

export class OverrideStatusDto {
  @ApiProperty({ enum: OrderStatus, example: OrderStatus.CANCELLED })
  @IsEnum(OrderStatus)
  status!: OrderStatus;

  @ApiProperty({ description: 'Why the status is being forced', example: 'Refunded by phone' })
  @IsNotEmpty()
  @IsString()
  reason!: string;

  @ApiPropertyOptional({ description: 'Operator recorded in the audit log', example: 'ops@example.com' })
  @IsOptional()
  @IsString()
  actor?: string;
}

export class ResendEmailDto {
  @ApiPropertyOptional({ description: 'Operator recorded in the audit log', example: 'ops@example.com' })
  @IsOptional()
  @IsString()
  actor?: string;
}

/**
 * DTO for listing orders with filters
 */
export class ListOrdersDto {
  @ApiPropertyOptional({ enum: OrderStatus })
  @IsOptional()
  @IsEnum(OrderStatus)
  status?: OrderStatus;

  @ApiPropertyOptional({ enum: ServiceType })
  @IsOptional()
  @IsEnum(ServiceType)
  serviceType?: ServiceType;

  @ApiPropertyOptional({ example: 'flow' })
  @IsOptional()
  @IsString()
  gateway?: string;

  @ApiPropertyOptional({ example: 'ana@example.com' })
  @IsOptional()
  @IsString()
  email?: string;

  @ApiPropertyOptional({ description: 'Created at or after', example: '2026-01-01T00:00:00Z' })
  @IsOptional()
  @IsDateString()
  fromDate?: string;

  @ApiPropertyOptional({ description: 'Created at or before', example: '2026-12-31T23:59:59Z' })
  @IsOptional()
  @IsDateString()
  toDate?: string;

  @ApiPropertyOptional({ default: 1, minimum: 1 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  page?: number = 1;

  @ApiPropertyOptional({ default: 50, minimum: 1, maximum: 200 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(200)
  limit?: number = 50;
}

export class CreateDiscountCodeRequestDto {
  @ApiProperty({ description: 'Code customers type (stored upper-case)', example: 'WELCOME10' })
  @IsString()
  @Length(1, 64)
  code!: string;

  @ApiProperty({ description: 'Whole-number percentage off', minimum: 1, maximum: 99, example: 10 })
  @IsInt()
  @Min(1)
  @Max(99)
  percent!: number;

  @ApiPropertyOptional({ description: 'Total redemptions allowed', minimum: 1, example: 100 })
  @IsOptional()
  @IsInt()
  @Min(1)
  maxUses?: number;

  @ApiPropertyOptional({ example: '2026-12-31T23:59:59Z' })
  @IsOptional()
  @IsDateString()
  expiresAt?: string;
}
