import { IsBoolean, IsInt, IsOptional, IsString, Matches, Max, Min } from 'class-validator';

const UID_PATTERN = /^(?:[0-9a-fA-F]{2})+$/;

export class CreateBuildingDto {
  @IsString()
  @Matches(UID_PATTERN, { message: 'uid must be an even number of hex digits' })
  uid!: string;

  @IsInt()
  @Min(0)
  @Max(255)
  buildingType!: number;
}

export class ScanDto {
  @IsString()
  @Matches(UID_PATTERN, { message: 'uid must be an even number of hex digits' })
  uid!: string;

  /** Tag data area as hex; omit to simulate an unreadable card */
  @IsOptional()
  @IsString()
  @Matches(/^(?:[0-9a-fA-F]{2})*$/, { message: 'data must be hex encoded' })
  data?: string;
}

export class SetScanModeDto {
  @IsBoolean()
  deleteMode!: boolean;
}
