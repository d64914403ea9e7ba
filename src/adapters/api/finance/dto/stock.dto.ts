// src/adapters/api/finance/dto/stock.dto.ts
import { Type } from 'class-transformer';
import { IsBoolean, IsInt, IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';
import { DecimalString } from '../../dto/decimal.dto';
import { ListQueryDto, QueryBoolean } from '../../dto/list-query.dto';

export class CreateStockItemDto {
  @IsString()
  @IsNotEmpty({ message: 'name may not be blank.' })
  @MaxLength(150, { message: 'name must be at most 150 characters.' })
  name!: string;

  @IsOptional()
  @IsString()
  description?: string | null;

  @IsOptional()
  @IsString()
  @MaxLength(20)
  unitOfMeasure?: string;

  @IsOptional()
  @DecimalString({ field: 'quantityOnHand', signed: true })
  quantityOnHand?: string;

  @IsOptional()
  @DecimalString({ field: 'reorderLevel' })
  reorderLevel?: string;
}

export class UpdateStockItemDto {
  @IsOptional()
  @IsString()
  @IsNotEmpty({ message: 'name may not be blank.' })
  @MaxLength(150, { message: 'name must be at most 150 characters.' })
  name?: string;

  @IsOptional()
  @IsString()
  description?: string | null;

  @IsOptional()
  @IsString()
  @MaxLength(20)
  unitOfMeasure?: string;

  @IsOptional()
  @DecimalString({ field: 'quantityOnHand', signed: true })
  quantityOnHand?: string;

  @IsOptional()
  @DecimalString({ field: 'reorderLevel' })
  reorderLevel?: string;
}

export class StockItemQueryDto extends ListQueryDto {
  @IsOptional()
  @QueryBoolean()
  @IsBoolean({ message: 'needsReorder must be a boolean.' })
  needsReorder?: boolean;
}

export class CreateStockTransactionDto {
  @IsInt({ message: 'itemId must be an integer.' })
  itemId!: number;

  @DecimalString({ field: 'quantityChanged', signed: true })
  quantityChanged!: string;

  @IsOptional()
  @IsString()
  @MaxLength(255)
  reason?: string;
}

export class StockTransactionQueryDto extends ListQueryDto {
  @IsOptional()
  @Type(() => Number)
  @IsInt({ message: 'item must be an integer.' })
  item?: number;
}
