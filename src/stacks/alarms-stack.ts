import { Stack, StackProps, Duration } from "aws-cdk-lib";
import { Construct } from "constructs";
import * as cw from "aws-cdk-lib/aws-cloudwatch";
import * as sqs from "aws-cdk-lib/aws-sqs";
import * as lambda from "aws-cdk-lib/aws-lambda";

export interface AlarmsStackProps extends StackProps {
  submissionQueue: sqs.IQueue;
  submissionDlq: sqs.IQueue;
  apiFn: lambda.IFunction;
  auditFn: lambda.IFunction;
  metricsNamespace: string;
}

export class AlarmsStack extends Stack {
  constructor(scope: Construct, id: string, props: AlarmsStackProps) {
    super(scope, id, props);

    const NS = props.metricsNamespace;
    const sum = (metricName: string) =>
      new cw.Metric({ namespace: NS, metricName, period: Duration.minutes(5), statistic: "Sum" });

    // ---- DLQ alarm
    new cw.Alarm(this, "SubmissionQueue-DLQ-Alarm", {
      metric: props.submissionDlq.metricApproximateNumberOfMessagesVisible({ period: Duration.minutes(1), statistic: "Sum" }),
      threshold: 0,
      evaluationPeriods: 5,
      comparisonOperator: cw.ComparisonOperator.GREATER_THAN_THRESHOLD,
      treatMissingData: cw.TreatMissingData.NOT_BREACHING,
      alarmDescription: "EMR submissions are landing in the DLQ",
    });

    // ---- Lambda error alarms
    const errAlarm = (fn: lambda.IFunction, name: string) => new cw.Alarm(this, `${name}-Errors-Alarm`, {
      metric: fn.metricErrors({ period: Duration.minutes(1), statistic: "Sum" }),
      threshold: 0,
      evaluationPeriods: 3,
      comparisonOperator: cw.ComparisonOperator.GREATER_THAN_THRESHOLD,
      treatMissingData: cw.TreatMissingData.NOT_BREACHING,
      alarmDescription: `${name} has errors`,
    });
    errAlarm(props.apiFn, "ApiFn");
    errAlarm(props.auditFn, "AuditFn");

    // ---- Failed batch ratio > 20%
    const failed = sum("tm2_batch_failed_count");
    const completed = sum("tm2_batch_completed_count");
    const failedPct = new cw.MathExpression({
      expression: "IF((m1+m2)>0,(m1/(m1+m2))*100,0)",
      usingMetrics: { m1: failed, m2: completed },
      period: Duration.minutes(5),
    });
    new cw.Alarm(this, "BatchFailedPct-Alarm", {
      metric: failedPct,
      threshold: 20,
      evaluationPeriods: 3,
      comparisonOperator: cw.ComparisonOperator.GREATER_THAN_THRESHOLD,
      treatMissingData: cw.TreatMissingData.NOT_BREACHING,
      alarmDescription: "More than 20% of TM2 batches failed",
    });

    // ---- Dashboard
    const dash = new cw.Dashboard(this, "Dashboard", { dashboardName: "Tm2-Emr-Dashboard" });

    dash.addWidgets(
      new cw.GraphWidget({ title: "Batches", left: [completed, failed], width: 12 }),
      new cw.GraphWidget({
        title: "Records",
        left: [
          sum("tm2_records_received_count"),
          sum("tm2_invalid_records_count"),
          sum("tm2_duplicate_records_count"),
          sum("tm2_conversion_error_count"),
        ],
        width: 12,
      }),
    );

    dash.addWidgets(
      new cw.GraphWidget({
        title: "Batch time (p95)",
        left: [new cw.Metric({ namespace: NS, metricName: "tm2_batch_time_ms", period: Duration.minutes(5), statistic: "p95" })],
        width: 8,
      }),
      new cw.GraphWidget({
        title: "Submission Queue",
        left: [props.submissionQueue.metricApproximateNumberOfMessagesVisible(), props.submissionQueue.metricNumberOfMessagesSent()],
        width: 8,
      }),
      new cw.GraphWidget({
        title: "Lambda Errors",
        left: [props.apiFn.metricErrors(), props.auditFn.metricErrors()],
        width: 8,
      }),
    );
  }
}
