import { Stack, StackProps, RemovalPolicy, CfnOutput } from "aws-cdk-lib";
import { Construct } from "constructs";
import * as kms from "aws-cdk-lib/aws-kms";
import * as dynamodb from "aws-cdk-lib/aws-dynamodb";
import * as tags from "aws-cdk-lib";

export class DataStack extends Stack {
  public readonly dataKey: kms.Key;
  public readonly runsTable: dynamodb.Table;

  constructor(scope: Construct, id: string, props?: StackProps) {
    super(scope, id, props);

    // Customer-managed KMS key for DDB (rotates yearly)
    this.dataKey = new kms.Key(this, "DataKey", {
      alias: "alias/tm2-emr-data-key",
      enableKeyRotation: true,
      removalPolicy: RemovalPolicy.DESTROY // dev; change to RETAIN for prod
    });

    // Run history: PK RUNS#<status>, SK RUN#<startedAt>#<processingId>
    this.runsTable = new dynamodb.Table(this, "RunsTable", {
      tableName: "tm2-emr-runs",
      partitionKey: { name: "PK", type: dynamodb.AttributeType.STRING },
      sortKey: { name: "SK", type: dynamodb.AttributeType.STRING },
      billingMode: dynamodb.BillingMode.PAY_PER_REQUEST,
      pointInTimeRecoverySpecification: { pointInTimeRecoveryEnabled: true },
      removalPolicy: RemovalPolicy.DESTROY, // dev only
      encryption: dynamodb.TableEncryption.CUSTOMER_MANAGED,
      encryptionKey: this.dataKey
    });

    new CfnOutput(this, "RunsTableName", { value: this.runsTable.tableName });
    new CfnOutput(this, "RunsTableArn", { value: this.runsTable.tableArn });
    new CfnOutput(this, "DataKeyArn", { value: this.dataKey.keyArn });

    tags.Tags.of(this).add("project", "tm2-emr-pipeline");
    tags.Tags.of(this).add("stack", "data");
    tags.Tags.of(this).add("env", this.node.tryGetContext("env") ?? "dev");
  }
}
