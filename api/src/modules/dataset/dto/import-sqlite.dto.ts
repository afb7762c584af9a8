import { Transform, type TransformFnParams } from 'class-transformer';
import { IsBoolean, IsNotEmpty, IsOptional, IsString } from 'class-validator';

/**
 * Reads the flag from the raw body, so implicit conversion cannot turn the
 * string "false" into true. "true" and "false" map to booleans; any other
 * value is passed on unchanged for @IsBoolean to reject.
 */
function toBooleanFlag({ obj, key }: TransformFnParams): unknown {
  const raw: unknown = obj[key];
  if (raw === 'true') return true;
  if (raw === 'false') return false;
  return raw;
}

/**
 * Body of POST /admin/datasets/:datasetId/import/sqlite
 */
export class ImportSqliteDto {
  /** Decrypted database, relative to DATA_DIR. */
  @IsString()
  @IsNotEmpty()
  path!: string;

  @IsOptional()
  @Transform(toBooleanFlag)
  @IsBoolean()
  excludeOwner?: boolean;
}
