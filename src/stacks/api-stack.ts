import { Duration, Stack, StackProps, CfnOutput, Tags } from "aws-cdk-lib";
import { Construct } from "constructs";
import * as apigwv2 from "aws-cdk-lib/aws-apigatewayv2";
import * as apigwv2Authorizers from "aws-cdk-lib/aws-apigatewayv2-authorizers";
import * as apigwv2Integrations from "aws-cdk-lib/aws-apigatewayv2-integrations";
import * as cognito from "aws-cdk-lib/aws-cognito";
import * as dynamodb from "aws-cdk-lib/aws-dynamodb";
import * as iam from "aws-cdk-lib/aws-iam";
import * as lambda from "aws-cdk-lib/aws-lambda";
import { NodejsFunction } from "aws-cdk-lib/aws-lambda-nodejs";
import * as sqs from "aws-cdk-lib/aws-sqs";
import * as path from "path";

export const METRICS_NS = "tm2.emr";

interface ApiStackProps extends StackProps {
  runsTable: dynamodb.ITable;
  submissionQueue: sqs.IQueue;
  auditFn?: lambda.IFunction;
}

export class ApiStack extends Stack {
  public readonly fn: NodejsFunction;
  public readonly api: apigwv2.HttpApi;

  constructor(scope: Construct, id: string, props: ApiStackProps) {
    super(scope, id, props);

    Tags.of(this).add("app", "tm2-emr-pipeline");
    Tags.of(this).add("stack", "api");

    // One function, one instance: term mappings and cumulative statistics live in its memory,
    // so every route must reach the same container
    this.fn = new NodejsFunction(this, "ApiFn", {
      entry: path.resolve(__dirname, "../../services/api/handler.ts"),
      handler: "main",
      runtime: lambda.Runtime.NODEJS_20_X,
      memorySize: 512,
      timeout: Duration.seconds(60),
      reservedConcurrentExecutions: 1,
      environment: {
        SERVICE_NAME: "tm2-emr-pipeline",
        RUNS_TABLE_NAME: props.runsTable.tableName,
        SUBMISSION_QUEUE_URL: props.submissionQueue.queueUrl,
        METRICS_NS,
        ...(props.auditFn ? { AUDIT_FN_ARN: props.auditFn.functionArn } : {}),
      },
      bundling: {
        target: "node20",
        sourceMap: true,
        keepNames: true,
      },
    });

    this.fn.addToRolePolicy(new iam.PolicyStatement({
      actions: ["cloudwatch:PutMetricData"],
      resources: ["*"],
      conditions: { StringEquals: { "cloudwatch:namespace": METRICS_NS } },
    }));

    props.runsTable.grantReadWriteData(this.fn);
    props.submissionQueue.grantSendMessages(this.fn);
    if (props.auditFn) {
      props.auditFn.grantInvoke(this.fn);
    }

    // Admins (cognito group "admin") may register new term mappings
    const userPool = new cognito.UserPool(this, "UserPool", {
      userPoolName: "tm2-emr-users",
      selfSignUpEnabled: false,
      signInAliases: { email: true },
    });
    const client = userPool.addClient("ApiClient", { authFlows: { userSrp: true } });
    new cognito.CfnUserPoolGroup(this, "AdminGroup", { userPoolId: userPool.userPoolId, groupName: "admin" });
    const authorizer = new apigwv2Authorizers.HttpUserPoolAuthorizer("UserPoolAuthorizer", userPool, {
      userPoolClients: [client],
    });

    const integration = new apigwv2Integrations.HttpLambdaIntegration("ApiIntegration", this.fn);
    this.api = new apigwv2.HttpApi(this, "Tm2Api", { apiName: "tm2-emr-api" });

    const open: Array<[string, apigwv2.HttpMethod]> = [
      ["/health", apigwv2.HttpMethod.GET],
      ["/status", apigwv2.HttpMethod.GET],
      ["/data/cleanup-stats", apigwv2.HttpMethod.GET],
      ["/emr/preview", apigwv2.HttpMethod.POST],
    ];
    for (const [routePath, method] of open) {
      this.api.addRoutes({ path: routePath, methods: [method], integration });
    }
    this.api.addRoutes({ path: "/ingest/trigger", methods: [apigwv2.HttpMethod.POST], integration, authorizer });
    this.api.addRoutes({ path: "/mappings", methods: [apigwv2.HttpMethod.POST], integration, authorizer });

    new CfnOutput(this, "ApiUrl", { value: this.api.apiEndpoint });
    new CfnOutput(this, "UserPoolId", { value: userPool.userPoolId });
  }
}
