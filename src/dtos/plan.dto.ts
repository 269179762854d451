import { Type } from "class-transformer";
import {
  ArrayNotEmpty,
  IsArray,
  IsBoolean,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsObject,
  IsOptional,
  IsString,
  Matches,
  Max,
  Min,
  ValidateIf,
  ValidateNested,
} from "class-validator";

export class ShardKeyDto {
  @IsString()
  @IsNotEmpty()
  public primaryField!: string;

  @IsString()
  @IsNotEmpty()
  public tiebreakerField!: string;
}

export class KeyDomainDto {
  @IsIn(["integer", "ordered"])
  public kind!: "integer" | "ordered";

  @ValidateIf((o: KeyDomainDto) => o.kind === "integer")
  @IsInt()
  public min?: number;

  @ValidateIf((o: KeyDomainDto) => o.kind === "integer")
  @IsInt()
  public max?: number;

  @ValidateIf((o: KeyDomainDto) => o.kind === "ordered")
  @IsArray()
  @ArrayNotEmpty()
  public values?: (string | number)[];
}

export class PolicyDto {
  @IsIn(["round-robin", "weighted"])
  public kind!: "round-robin" | "weighted";

  @ValidateIf((o: PolicyDto) => o.kind === "weighted")
  @IsObject()
  public weights?: Record<string, number>;
}

export class CreatePlanDto {
  @IsOptional()
  @IsString()
  @Matches(/^[^.\s]+\.\S+$/, { message: "collection must be a <db>.<collection> namespace" })
  public collection?: string;

  @IsOptional()
  @ValidateNested()
  @Type(() => ShardKeyDto)
  public shardKey?: ShardKeyDto;

  @IsOptional()
  @ValidateNested()
  @Type(() => KeyDomainDto)
  public domain?: KeyDomainDto;

  @IsOptional()
  @IsInt()
  @Min(1)
  public shardCount?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  public splitCount?: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  @Max(1)
  public tolerance?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  public concurrency?: number;

  @IsOptional()
  @ValidateNested()
  @Type(() => PolicyDto)
  public policy?: PolicyDto;

  @IsOptional()
  @IsBoolean()
  public refresh?: boolean;
}

export class BalancerStateDto {
  @IsBoolean()
  public enabled!: boolean;
}

export class DistributionQueryDto {
  @IsOptional()
  @IsString()
  @Matches(/^[^.\s]+\.\S+$/, { message: "collection must be a <db>.<collection> namespace" })
  public collection?: string;

  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  @Min(0)
  @Max(1)
  public tolerance?: number;

  // poll until balanced or this many ms have passed
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  @Max(600000)
  public waitMs?: number;
}

export class RunQueryDto {
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  @Max(600000)
  public waitMs?: number;
}

export class RouteQueryDto {
  @IsString()
  @IsNotEmpty()
  public primary!: string;
}
