import { Transform } from 'class-transformer';

/** Query-string booleans: "true"/"1" and "false"/"0"; anything else is left for @IsBoolean to reject. */
export const ToBoolean = () =>
  Transform(({ value }: { value: unknown }) => {
    if (value === true || value === 'true' || value === '1') return true;
    if (value === false || value === 'false' || value === '0') return false;
    return value;
  });
