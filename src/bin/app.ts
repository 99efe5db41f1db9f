import * as cdk from 'aws-cdk-lib';
import { DataStack } from '../stacks/data-stack';
import { StorageStack } from '../stacks/storage-stack';
import { MessagingStack } from '../stacks/messaging-stack';
import { AuditStack } from '../stacks/audit-stack';
import { ApiStack, METRICS_NS } from '../stacks/api-stack';
import { AlarmsStack } from '../stacks/alarms-stack';

const app = new cdk.App();

const env = {
    account: process.env.CDK_DEFAULT_ACCOUNT,
    region: process.env.CDK_DEFAULT_REGION || 'eu-central-1',
};

// ── Foundations
const data = new DataStack(app, 'Tm2-Data', { env });
const storage = new StorageStack(app, 'Tm2-Storage', { env });
const messaging = new MessagingStack(app, 'Tm2-Messaging', { env });

// ── Audit (shared function)
const audit = new AuditStack(app, 'Tm2-Audit', {
    env,
    auditBucket: storage.auditBucket,
});

// ── Pipeline API
const api = new ApiStack(app, 'Tm2-Api', {
    env,
    runsTable: data.runsTable,
    submissionQueue: messaging.submissionQueue,
    auditFn: audit.auditFn,
});

// ── Alarms
const alarms = new AlarmsStack(app, 'Tm2-Alarms', {
    env,
    submissionQueue: messaging.submissionQueue,
    submissionDlq: messaging.submissionDlq,
    apiFn: api.fn,
    auditFn: audit.auditFn,
    metricsNamespace: METRICS_NS,
});

audit.addDependency(storage);

api.addDependency(data);
api.addDependency(messaging);
api.addDependency(audit);

alarms.addDependency(api);
alarms.addDependency(messaging);
