import { ArrayNotEmpty, IsArray, IsString } from 'class-validator';

/**
 * Body of POST /datasets/:datasetId/intersection
 */
export class IntersectionRequestDto {
  @IsArray()
  @ArrayNotEmpty()
  @IsString({ each: true })
  groupIds!: string[];
}
