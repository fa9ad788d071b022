import { S3Client } from '@aws-sdk/client-s3';
import type { AppConfig } from '../config';
import { closeForecastDb, getForecastDb } from '../storage';
import type { ForecastBackend } from './forecast-backend';
import { ObjectStorageBackend } from './object-storage-backend';
import { ParquetBackend } from './parquet-backend';
import { RelationalBackend } from './relational-backend';

/**
 * Build the storage backend selected by DATA_BACKEND.
 *
 * The cloud backend falls back to the local parquet directory when
 * USE_LOCAL_DATA is set or AWS credentials are missing, so a developer
 * checkout serves sample data without any cloud access.
 */
export function createBackend(config: AppConfig): ForecastBackend {
  switch (config.dataBackend) {
    case 'parquet':
      return new ParquetBackend(config.dataPath, config.retry);

    case 'database': {
      const backend = new RelationalBackend(getForecastDb(config.databaseUrl), config.retry);
      return Object.assign(backend, { close: closeForecastDb });
    }

    case 'cloud': {
      const { bucketName, region, dataPrefix, dataKey, accessKeyId, secretAccessKey } =
        config.cloud;
      if (config.useLocalData || !accessKeyId || !secretAccessKey || !bucketName) {
        console.warn(
          `[backend] Cloud backend unavailable (${
            config.useLocalData ? 'USE_LOCAL_DATA=true' : 'missing bucket or AWS credentials'
          }); falling back to local parquet at ${config.dataPath}`
        );
        return new ParquetBackend(config.dataPath, config.retry);
      }
      const client = new S3Client({ region, credentials: { accessKeyId, secretAccessKey } });
      const backend = new ObjectStorageBackend(
        client,
        { bucket: bucketName, prefix: dataPrefix, key: dataKey },
        config.retry
      );
      return Object.assign(backend, {
        close: async () => {
          client.destroy();
        },
      });
    }
  }
}
