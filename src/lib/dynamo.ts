import {
  PutCommand,
  QueryCommand,
  UpdateCommand,
  type DynamoDBDocumentClient,
  type PutCommandInput,
  type QueryCommandInput,
  type UpdateCommandInput,
} from "@aws-sdk/lib-dynamodb";
import type { Logger } from "./logger";
import { userPartitionKey, type PlanKey, type PlanRecord } from "./schemas";

export interface PlanStore {
  /**
   * Writes a new plan record. Never overwrites an existing item.
   * @param record The record to save, with `artifactStatus = "pending"`.
   */
  savePlan(record: PlanRecord): Promise<void>;
  /**
   * Back-fills the artifact for the record identified by `(userId, recordId)`.
   * @param artifactUrl URL of the uploaded canvas. Must not be empty.
   * @param generatedAt ISO timestamp of the canvas.
   * @returns `false` when no such record exists.
   */
  markArtifactCompleted(userId: string, recordId: string, artifactUrl: string, generatedAt: string): Promise<boolean>;
  /**
   * Lists a user's plans, newest first.
   * @param limit Maximum number of records to return.
   */
  listPlans(userId: string, limit: number): Promise<PlanRecord[]>;
}

type Item = Record<string, unknown>;

export interface QueryPage {
  Items?: Item[];
  LastEvaluatedKey?: Item;
}

/** The table operations the plan store issues. */
export interface PlanTable {
  put(input: PutCommandInput): Promise<void>;
  query(input: QueryCommandInput): Promise<QueryPage>;
  update(input: UpdateCommandInput): Promise<void>;
}

export function documentTable(docClient: DynamoDBDocumentClient): PlanTable {
  return {
    put: async (input) => {
      await docClient.send(new PutCommand(input));
    },
    query: async (input) => {
      const { Items, LastEvaluatedKey } = await docClient.send(new QueryCommand(input));
      return { Items, LastEvaluatedKey };
    },
    update: async (input) => {
      await docClient.send(new UpdateCommand(input));
    },
  };
}

export interface DynamoPlanStoreOptions {
  tableName: string;
  /** GSI keyed on `recordId`. Empty: query the user partition with a filter. */
  recordIdIndex: string;
}

function isPlanItem(item: Item): item is Item & PlanRecord {
  return (
    typeof item.PK === "string" &&
    item.PK.startsWith("USER#") &&
    typeof item.SK === "string" &&
    item.SK.startsWith("PLAN#") &&
    typeof item.recordId === "string" &&
    typeof item.userId === "string"
  );
}

export function toPlanRecords(items: Item[] | undefined): PlanRecord[] {
  return (items ?? []).filter(isPlanItem);
}

/**
 * Reads the table key of an item owned by `userId`. Index results may carry
 * nothing but the keys, so ownership is decided by `PK` alone.
 */
export function ownedPlanKey(item: Item, userId: string): PlanKey | null {
  const { PK, SK } = item;
  const partition = userPartitionKey(userId);
  if (PK !== partition || typeof SK !== "string" || !SK.startsWith("PLAN#")) return null;
  return { PK: partition, SK: `PLAN#${SK.slice("PLAN#".length)}` };
}

/**
 * The plan table uses the single-table layout: `PK = USER#{userId}`,
 * `SK = PLAN#{createdAt}#{recordId}`.
 */
export class DynamoPlanStore implements PlanStore {
  constructor(
    private readonly table: PlanTable,
    private readonly options: DynamoPlanStoreOptions,
    private readonly logger: Logger,
  ) {}

  async savePlan(record: PlanRecord): Promise<void> {
    try {
      await this.table.put({
        TableName: this.options.tableName,
        Item: record,
        ConditionExpression: "attribute_not_exists(PK)",
      });
      this.logger.info("Saved plan record", { userId: record.userId, recordId: record.recordId });
    } catch (error) {
      this.logger.error("Error saving plan record", { recordId: record.recordId, error });
      throw new Error("Could not save plan record to DynamoDB.", { cause: error });
    }
  }

  /**
   * Finds the table key of a record by its id, through the record-id index
   * when one is configured, else by filtering the user's partition.
   * @returns The key, or null when the user owns no such record.
   */
  async findPlanKey(userId: string, recordId: string): Promise<PlanKey | null> {
    const input: QueryCommandInput = this.options.recordIdIndex
      ? {
          TableName: this.options.tableName,
          IndexName: this.options.recordIdIndex,
          KeyConditionExpression: "recordId = :rid",
          ExpressionAttributeValues: { ":rid": recordId },
        }
      : {
          TableName: this.options.tableName,
          KeyConditionExpression: "PK = :pk",
          FilterExpression: "recordId = :rid",
          ExpressionAttributeValues: { ":pk": userPartitionKey(userId), ":rid": recordId },
        };

    let exclusiveStartKey: Item | undefined;
    do {
      const { Items, LastEvaluatedKey } = await this.table.query({ ...input, ExclusiveStartKey: exclusiveStartKey });
      for (const item of Items ?? []) {
        const key = ownedPlanKey(item, userId);
        if (key) return key;
      }
      exclusiveStartKey = LastEvaluatedKey;
    } while (exclusiveStartKey);

    return null;
  }

  async markArtifactCompleted(
    userId: string,
    recordId: string,
    artifactUrl: string,
    generatedAt: string,
  ): Promise<boolean> {
    if (!artifactUrl) {
      throw new Error("A completed artifact needs a URL.");
    }

    const key = await this.findPlanKey(userId, recordId);
    if (!key) {
      this.logger.warn("Plan record not found for artifact back-fill", { userId, recordId });
      return false;
    }

    await this.table.update({
      TableName: this.options.tableName,
      Key: { ...key },
      UpdateExpression: "SET artifactUrl = :url, artifactStatus = :status, artifactGeneratedAt = :ts",
      ConditionExpression: "attribute_exists(PK)",
      ExpressionAttributeValues: {
        ":url": artifactUrl,
        ":status": "completed",
        ":ts": generatedAt,
      },
    });
    this.logger.info("Updated plan record with artifact", { userId, recordId });
    return true;
  }

  async listPlans(userId: string, limit: number): Promise<PlanRecord[]> {
    try {
      const { Items } = await this.table.query({
        TableName: this.options.tableName,
        KeyConditionExpression: "PK = :pk AND begins_with(SK, :plan)",
        ExpressionAttributeValues: {
          ":pk": userPartitionKey(userId),
          ":plan": "PLAN#",
        },
        ScanIndexForward: false,
        Limit: limit,
      });
      return toPlanRecords(Items);
    } catch (error) {
      this.logger.error("Error querying plans", { userId, error });
      throw new Error("Could not query plans from DynamoDB.", { cause: error });
    }
  }
}
