import { CloudWatchClient, PutMetricDataCommand, type StandardUnit } from "@aws-sdk/client-cloudwatch";
import { loadConfig } from "../config";

const cw = new CloudWatchClient({});
// unset namespace = metrics off (local runs, tests)
const NAMESPACE = loadConfig().metricsNamespace;

function dims(d: Record<string, string> | undefined) {
    return Object.entries(d ?? {}).map(([Name, Value]) => ({ Name, Value }));
}

async function put(name: string, value: number, unit: StandardUnit, d?: Record<string, string>) {
    if (!NAMESPACE) return;
    try {
        await cw.send(new PutMetricDataCommand({
            Namespace: NAMESPACE,
            MetricData: [{ MetricName: name, Value: value, Unit: unit, Dimensions: dims(d) }],
        }));
    } catch (e) {
        console.warn("metric-failed", name, e instanceof Error ? e.message : String(e));
    }
}

export async function metricCount(name: string, value = 1, d?: Record<string, string>) {
    await put(name, value, "Count", d);
}

export async function metricMs(name: string, ms: number, d?: Record<string, string>) {
    await put(name, ms, "Milliseconds", d);
}
