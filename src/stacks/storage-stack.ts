import { Stack, StackProps, RemovalPolicy, CfnOutput, Duration } from "aws-cdk-lib";
import { Construct } from "constructs";
import * as s3 from "aws-cdk-lib/aws-s3";
import * as kms from "aws-cdk-lib/aws-kms";
import * as tags from "aws-cdk-lib";

export class StorageStack extends Stack {
  public readonly storageKey: kms.Key;
  public readonly auditBucket: s3.Bucket;

  constructor(scope: Construct, id: string, props?: StackProps) {
    super(scope, id, props);

    this.storageKey = new kms.Key(this, "StorageKey", {
      alias: "alias/tm2-emr-storage-key",
      enableKeyRotation: true,
      removalPolicy: RemovalPolicy.DESTROY
    });

    // Audit trail: source=<source>/date=<YYYY-MM-DD>/hour=<HH>/<uuid>.jsonl
    this.auditBucket = new s3.Bucket(this, "AuditBucket", {
      bucketName: `${Stack.of(this).stackName.toLowerCase()}-audit-${this.account}-${this.region}`.slice(0, 63),
      encryption: s3.BucketEncryption.KMS,
      encryptionKey: this.storageKey,
      blockPublicAccess: s3.BlockPublicAccess.BLOCK_ALL,
      objectOwnership: s3.ObjectOwnership.BUCKET_OWNER_ENFORCED,
      enforceSSL: true,
      versioned: true,
      removalPolicy: RemovalPolicy.RETAIN
    });

    this.auditBucket.addLifecycleRule({
      abortIncompleteMultipartUploadAfter: Duration.days(7),
      transitions: [{ storageClass: s3.StorageClass.INFREQUENT_ACCESS, transitionAfter: Duration.days(90) }]
    });

    new CfnOutput(this, "AuditBucketName", { value: this.auditBucket.bucketName });
    new CfnOutput(this, "StorageKeyArn", { value: this.storageKey.keyArn });

    tags.Tags.of(this).add("project", "tm2-emr-pipeline");
    tags.Tags.of(this).add("stack", "storage");
    tags.Tags.of(this).add("env", this.node.tryGetContext("env") ?? "dev");
  }
}
