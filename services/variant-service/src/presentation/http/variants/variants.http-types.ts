export interface CreateVariantSetRequestBody {
  sourceBucket: string;
  sourceObjectKey: string;
  prefix?: string;
  fileName?: string;
  keepSourceName?: boolean;
}
