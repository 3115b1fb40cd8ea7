import { IsInt, IsNotEmpty, IsNumber, IsPositive, IsString, Matches, Min } from 'class-validator';

// DTO for a manually entered bond position (HTTP body or seed file entry).
// purchaseId is the upsert key.
export class CreateBondDto {
  @IsString()
  @IsNotEmpty()
  purchaseId!: string;

  @IsString()
  @IsNotEmpty()
  symbol!: string;

  @IsInt()
  @Min(0)
  quantity!: number;

  @IsNumber()
  @IsPositive()
  purchasePrice!: number;

  @IsNumber()
  @Min(0)
  currentPrice!: number;

  @IsNumber()
  coupon!: number;

  @IsString()
  @Matches(/^\d+(\.\d+)?%$/, { message: 'yieldRate must be a percentage such as 1.35%' })
  yieldRate!: string;

  @IsString()
  @Matches(/^\d{1,2}\/\d{1,2}\/\d{4}$/, { message: 'purchaseDate must be MM/DD/YYYY' })
  purchaseDate!: string;
}
