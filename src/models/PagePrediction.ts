/**
 * PagePrediction.ts
 * Shape of one entry of the oracle's `pagePredictions` reply, with class-validator decorators
 */
import 'reflect-metadata';
import { Type } from 'class-transformer';
import {
  IsArray,
  IsBoolean,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Min,
  ValidateNested,
} from 'class-validator';

export class PagePrediction {
  @Type(() => Number)
  @IsInt()
  @Min(0)
  pageIndex: number = -1;

  @IsString()
  @IsNotEmpty()
  label: string = '';

  // clamped to [0,100] by the reply parser
  @Type(() => Number)
  @IsNumber({ allowNaN: false, allowInfinity: false })
  confidencePercent: number = 0;

  @IsBoolean()
  @IsOptional()
  isTextIncoherent?: boolean;
}

export class BatchPredictionReply {
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => PagePrediction)
  pagePredictions: PagePrediction[] = [];
}

/**
 * Reply to a single-page image query
 */
export class VisionPrediction {
  @IsString()
  @IsNotEmpty()
  label: string = '';

  @Type(() => Number)
  @IsNumber({ allowNaN: false, allowInfinity: false })
  confidencePercent: number = 0;
}
