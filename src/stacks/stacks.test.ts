import { App } from "aws-cdk-lib";
import { Match, Template } from "aws-cdk-lib/assertions";
import { ApiStack } from "./api-stack";
import { DataStack } from "./data-stack";
import { MessagingStack } from "./messaging-stack";

test("runs table is keyed by status partition and time-ordered sort key", () => {
  const template = Template.fromStack(new DataStack(new App(), "Data"));
  template.hasResourceProperties("AWS::DynamoDB::Table", {
    TableName: "tm2-emr-runs",
    KeySchema: [
      { AttributeName: "PK", KeyType: "HASH" },
      { AttributeName: "SK", KeyType: "RANGE" },
    ],
    SSESpecification: Match.objectLike({ SSEEnabled: true, SSEType: "KMS" }),
  });
});

test("submission queue redrives to its DLQ after five receives", () => {
  const template = Template.fromStack(new MessagingStack(new App(), "Messaging"));
  template.resourceCountIs("AWS::SQS::Queue", 2);
  template.hasResourceProperties("AWS::SQS::Queue", {
    QueueName: "tm2-emr-submission-queue",
    RedrivePolicy: Match.objectLike({ maxReceiveCount: 5 }),
  });
  template.hasResourceProperties("AWS::SQS::Queue", { QueueName: "tm2-emr-submission-queue-dlq" });
});

test("api function is capped at one instance so every route sees the same memory", () => {
  // skip esbuild bundling; only the function's configuration is checked
  const app = new App({ context: { "aws:cdk:bundling-stacks": [] } });
  const data = new DataStack(app, "Data");
  const messaging = new MessagingStack(app, "Messaging");
  const api = new ApiStack(app, "Api", { runsTable: data.runsTable, submissionQueue: messaging.submissionQueue });

  Template.fromStack(api).hasResourceProperties("AWS::Lambda::Function", {
    Handler: "index.main",
    ReservedConcurrentExecutions: 1,
  });
});
