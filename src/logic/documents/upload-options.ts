import { ConfigService } from '@nestjs/config';
import { MulterModuleOptions } from '@nestjs/platform-express';
import { MAX_FILE_SIZE_BYTES } from './file-metadata';

// multer rejects larger uploads with 413 before the body reaches the controller
export function uploadOptions(configService: ConfigService): MulterModuleOptions {
    return {
        limits: { fileSize: configService.get<number>('MAX_FILE_SIZE_BYTES', MAX_FILE_SIZE_BYTES) },
    };
}
