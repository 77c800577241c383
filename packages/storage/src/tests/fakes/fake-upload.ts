import { PutObjectCommand, type PutObjectCommandInput } from "@aws-sdk/client-s3"

/**
 * Replaces `@aws-sdk/lib-storage`'s Upload in tests: a single PutObject
 * sent through whatever client S3Storage holds.
 */
export class FakeUpload {
  constructor(
    private readonly options: {
      client: { send(command: PutObjectCommand): Promise<unknown> }
      params: PutObjectCommandInput
    },
  ) {}

  async done(): Promise<void> {
    await this.options.client.send(new PutObjectCommand(this.options.params))
  }
}
