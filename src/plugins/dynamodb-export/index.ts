import { S3Client, ListObjectsV2Command, GetObjectCommand } from '@aws-sdk/client-s3';
import { Readable } from 'node:stream';
import { z } from 'zod';
import type {
  FormatConfiguration,
  InputFormat,
  InputSplit,
  RawRecord,
  RecordReader,
} from '../../backends/format/format';
import { fields } from '../../io/config';
import type { BatchConnector, BatchContext, FormatProvider } from '../../io/contracts';
import { getPluginByClass, registerBatchPlugin } from '../../io/mapping';
import { registerPlugin } from '../registry';
import { readExportLines } from './parse';

const ENTRY_BUCKET = 's3.bucket';
const ENTRY_PREFIX = 's3.prefix';
const ENTRY_REGION = 's3.region';

const DynamoExportConfigSchema = z.object({
  bucket: fields.string(),
  prefix: fields.string(),
  region: fields.string().default('eu-west-1'),
});

export type DynamoExportConfig = z.infer<typeof DynamoExportConfigSchema>;

const createClient = (conf: FormatConfiguration<unknown, unknown>): S3Client =>
  new S3Client({ region: conf.require(ENTRY_REGION) });

/**
 * Reads S3 buckets containing DynamoDB Export to S3 format (gzipped JSON lines).
 * One split per data file; keys are "<file>:<line>".
 */
export class DynamoExportInputFormat implements InputFormat {
  static readonly direction = 'input';
  static readonly formatName = 'dynamodb-export';
  static readonly keyType = 'string';
  static readonly valueType = 'record';

  async getSplits(conf: FormatConfiguration<unknown, unknown>): Promise<InputSplit[]> {
    const client = createClient(conf);
    const bucket = conf.require(ENTRY_BUCKET);
    const prefix = conf.require(ENTRY_PREFIX);
    const files: string[] = [];
    let continuationToken: string | undefined;

    try {
      do {
        const response = await client.send(
          new ListObjectsV2Command({
            Bucket: bucket,
            Prefix: prefix,
            ContinuationToken: continuationToken,
          })
        );

        for (const object of response.Contents ?? []) {
          if (object.Key && object.Key.endsWith('.json.gz')) {
            files.push(object.Key);
          }
        }

        continuationToken = response.NextContinuationToken;
      } while (continuationToken);
    } finally {
      client.destroy();
    }

    files.sort();
    return files.map((id) => ({ id }));
  }

  async createRecordReader(split: InputSplit, conf: FormatConfiguration<unknown, unknown>): Promise<RecordReader> {
    const client = createClient(conf);
    const bucket = conf.require(ENTRY_BUCKET);

    async function* records(): AsyncGenerator<RawRecord> {
      const response = await client.send(new GetObjectCommand({ Bucket: bucket, Key: split.id }));
      if (!response.Body) {
        return;
      }
      if (!(response.Body instanceof Readable)) {
        throw new TypeError(`Unexpected body type for s3://${bucket}/${split.id}`);
      }

      for await (const line of readExportLines(response.Body)) {
        yield { key: `${split.id}:${line.lineNumber}`, value: line.record };
      }
    }

    return {
      records,
      close: async () => {
        client.destroy();
      },
    };
  }
}

export class DynamoExportFormatProvider implements FormatProvider {
  constructor(private readonly config: DynamoExportConfig) {}

  getFormatClassName(): string {
    return DynamoExportInputFormat.formatName;
  }

  getFormatConfiguration(): Record<string, string> {
    return {
      [ENTRY_BUCKET]: this.config.bucket,
      [ENTRY_PREFIX]: this.config.prefix,
      [ENTRY_REGION]: this.config.region,
    };
  }
}

/**
 * Batch source over a DynamoDB export in S3.
 */
export class DynamoExportSource implements BatchConnector {
  static readonly pluginName = 'dynamodb-export';
  static readonly configSchema = DynamoExportConfigSchema;

  constructor(private readonly config: DynamoExportConfig) {}

  prepareRun(context: BatchContext): void {
    context.setInput(new DynamoExportFormatProvider(this.config));
  }
}

registerBatchPlugin(DynamoExportSource, DynamoExportInputFormat, DynamoExportFormatProvider);
registerPlugin(DynamoExportSource.pluginName, () => getPluginByClass(DynamoExportSource));
