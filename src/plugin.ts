import { createS3Client } from '@core/aws/s3';
import { UploadOrchestrator } from '@core/upload-orchestrator';
import {
  type AwsProviderExtended,
  CONFIG_KEY,
  getCustomHooks,
  getJobConfigs,
  getNoPut,
  PLUGIN_NAME,
  type Plugin,
  type RawS3PutConfig,
  type RawUploadJobConfig,
  type S3PutOptions,
  type Serverless,
} from '@shared';

export class ServerlessS3Put implements Plugin {
  private readonly serverless: Serverless;
  private readonly options: S3PutOptions;
  private readonly log: Plugin.Logging['log'];
  private readonly progress: Plugin.Logging['progress'];
  private readonly servicePath: string;

  public commands: Plugin.Commands;
  public hooks: Plugin.Hooks;

  constructor(
    serverless: Serverless,
    options: S3PutOptions,
    logging: Plugin.Logging,
  ) {
    this.serverless = serverless;
    this.options = options || {};
    this.log = logging.log;
    this.progress = logging.progress;
    this.servicePath = this.serverless.service.serverless.config.servicePath;

    this.commands = {
      s3put: {
        usage: 'Upload local files to S3 buckets',
        lifecycleEvents: ['upload'],
        options: {
          bucket: {
            usage: 'Only upload to the given bucket (e.g. "-b myBucket1")',
            shortcut: 'b',
            type: 'string',
          },
        },
      },
      deploy: {
        options: {
          nos3put: {
            type: 'boolean',
            usage: 'Disable upload to S3 during deploy',
          },
        },
      },
    };

    const noPut = getNoPut(this.getS3PutConfig(), this.options.nos3put);
    const customHookEntries = getCustomHooks(this.getS3PutConfig()).reduce(
      (acc: Plugin.Hooks, hook: string) => {
        acc[hook] = async () => {
          await this.upload();
        };
        return acc;
      },
      {},
    );

    this.hooks = {
      'after:deploy:deploy': async () => {
        if (noPut) return;
        await this.upload();
      },
      's3put:upload': async () => {
        await this.upload(true);
      },
      ...customHookEntries,
    };
  }

  private getProvider(): AwsProviderExtended {
    return this.serverless.getProvider('aws');
  }

  private getS3PutConfig(): RawS3PutConfig | RawUploadJobConfig[] | undefined {
    return this.serverless.service.custom?.[CONFIG_KEY];
  }

  async upload(invokedAsCommand?: boolean): Promise<void> {
    const rawJobs = getJobConfigs(this.getS3PutConfig());
    if (!rawJobs) {
      this.log.error(
        `${PLUGIN_NAME} requires at least one configuration entry in custom.${CONFIG_KEY}`,
      );
      return;
    }

    const orchestrator = new UploadOrchestrator({
      servicePath: this.servicePath,
      log: this.log,
      progress: this.progress,
      bucketFilter: this.options.bucket,
      getS3Client: (target) =>
        createS3Client({
          provider: this.getProvider(),
          endpoint: target.endpoint,
          region: target.region,
          credentials: target.credentials,
        }),
    });

    await orchestrator.upload(rawJobs, invokedAsCommand);
  }
}
