import { IsNotEmpty, IsString, MaxLength } from 'class-validator';

export class RegionQueryDto {
  @IsString({ message: 'region is required' })
  @IsNotEmpty({ message: 'region is required' })
  @MaxLength(64)
  region!: string;
}
