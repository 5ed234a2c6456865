import { SetMetadata } from '@nestjs/common';

export const IS_PUBLIC_KEY = 'isPublic';

/** Skips the tenant scope check (storage event bridge, health checks). */
export const Public = () => SetMetadata(IS_PUBLIC_KEY, true);
