import { Stack, StackProps, Duration, CfnOutput } from "aws-cdk-lib";
import { Construct } from "constructs";
import * as lambda from "aws-cdk-lib/aws-lambda";
import { NodejsFunction } from "aws-cdk-lib/aws-lambda-nodejs";
import * as s3 from "aws-cdk-lib/aws-s3";
import * as path from "path";

export interface AuditStackProps extends StackProps {
  auditBucket: s3.IBucket; // provided by StorageStack
}

export class AuditStack extends Stack {
  public readonly auditFn: NodejsFunction;

  constructor(scope: Construct, id: string, props: AuditStackProps) {
    super(scope, id, props);

    this.auditFn = new NodejsFunction(this, "AuditFn", {
      entry: path.resolve(__dirname, "../../services/audit/handler.ts"),
      handler: "handler",
      runtime: lambda.Runtime.NODEJS_20_X,
      timeout: Duration.seconds(10),
      environment: {
        AUDIT_BUCKET: props.auditBucket.bucketName,
      },
      bundling: { target: "node20", sourceMap: true },
    });

    props.auditBucket.grantPut(this.auditFn);

    new CfnOutput(this, "AuditFnArn", { value: this.auditFn.functionArn });
  }
}
