import { Stack, StackProps, Duration, CfnOutput, Tags } from "aws-cdk-lib";
import { Construct } from "constructs";
import * as sqs from "aws-cdk-lib/aws-sqs";
import * as iam from "aws-cdk-lib/aws-iam";

export class MessagingStack extends Stack {
  public readonly submissionQueue: sqs.Queue;
  public readonly submissionDlq: sqs.Queue;

  constructor(scope: Construct, id: string, props?: StackProps) {
    super(scope, id, props);

    Tags.of(this).add("app", "tm2-emr-pipeline");
    Tags.of(this).add("stack", "messaging");

    // DLQ (14d retention)
    this.submissionDlq = new sqs.Queue(this, "SubmissionDLQ", {
      queueName: "tm2-emr-submission-queue-dlq",
      retentionPeriod: Duration.days(14),
      visibilityTimeout: Duration.seconds(180),
      receiveMessageWaitTime: Duration.seconds(20),
    });

    // One message per patient record; the clinical-records consumer reads from here
    this.submissionQueue = new sqs.Queue(this, "SubmissionQueue", {
      queueName: "tm2-emr-submission-queue",
      visibilityTimeout: Duration.seconds(180),
      retentionPeriod: Duration.days(7),
      receiveMessageWaitTime: Duration.seconds(20),
      deadLetterQueue: { queue: this.submissionDlq, maxReceiveCount: 5 },
    });

    [this.submissionQueue, this.submissionDlq].forEach((q) => {
      q.addToResourcePolicy(new iam.PolicyStatement({
        sid: "DenyInsecureTransport",
        effect: iam.Effect.DENY,
        principals: [new iam.AnyPrincipal()],
        actions: ["sqs:*"],
        resources: [q.queueArn],
        conditions: { Bool: { "aws:SecureTransport": "false" } },
      }));
    });

    new CfnOutput(this, "SubmissionQueueUrl", { value: this.submissionQueue.queueUrl });
    new CfnOutput(this, "SubmissionQueueArn", { value: this.submissionQueue.queueArn });
    new CfnOutput(this, "SubmissionDLQUrl", { value: this.submissionDlq.queueUrl });
  }
}
