import type { TestContentInput } from "@shared/schema";
import {
  attemptIdFromKey,
  snapshotListPrefix,
  type ObjectStorage,
  type SnapshotMetadata,
} from "../object-storage";

export class InMemoryObjectStorage implements ObjectStorage {
  readonly objects = new Map<string, { content: string; metadata: SnapshotMetadata }>();

  async uploadSnapshot(key: string, content: string, metadata: SnapshotMetadata): Promise<string> {
    this.objects.set(key, { content, metadata });
    return key;
  }

  async downloadSnapshot(key: string): Promise<string | undefined> {
    return this.objects.get(key)?.content;
  }

  async deleteSnapshot(key: string): Promise<void> {
    this.objects.delete(key);
  }

  async listSnapshots(studentId: string, testId: string): Promise<string[]> {
    const prefix = snapshotListPrefix(studentId, testId);
    const ids: string[] = [];
    for (const key of this.objects.keys()) {
      const id = attemptIdFromKey(key, prefix);
      if (id) ids.push(id);
    }
    return ids;
  }
}

/** Every call rejects, as an unreachable object store would. */
export class FailingObjectStorage implements ObjectStorage {
  async uploadSnapshot(): Promise<string> {
    throw new Error("connect ECONNREFUSED 127.0.0.1:9000");
  }

  async downloadSnapshot(): Promise<string | undefined> {
    throw new Error("connect ECONNREFUSED 127.0.0.1:9000");
  }

  async deleteSnapshot(): Promise<void> {
    throw new Error("connect ECONNREFUSED 127.0.0.1:9000");
  }

  async listSnapshots(): Promise<string[]> {
    throw new Error("connect ECONNREFUSED 127.0.0.1:9000");
  }
}

/** Two questions, max score 8. */
export function sampleContent(overrides: Partial<TestContentInput> = {}): TestContentInput {
  return {
    courseId: "course-1",
    title: "Safety basics",
    minPoint: 4,
    description: null,
    questions: [
      {
        textOfQuestion: "Which extinguisher is for electrical fires?",
        answers: [
          { text: "Water", score: 0 },
          { text: "CO2", score: 5 },
        ],
      },
      {
        textOfQuestion: "Select the exits",
        answers: [
          { text: "North door", score: 2 },
          { text: "South door", score: 1 },
          { text: "Elevator", score: 0 },
        ],
      },
    ],
    ...overrides,
  };
}
