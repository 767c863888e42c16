import { z } from "zod";
import { ModuleError } from "../../errors.js";

export interface Course {
  id: number;
  name: string;
  course_code?: string;
}

export interface Assignment {
  id: number;
  name: string;
  due_at: string | null;
  points_possible: number | null;
}

export interface Submission {
  id: number;
  assignment_id: number;
  workflow_state: string;
}

/** What the canvas module needs from the learning platform. */
export interface CanvasClient {
  listCourses(signal: AbortSignal): Promise<Course[]>;
  listAssignments(courseId: number, signal: AbortSignal): Promise<Assignment[]>;
  submitText(courseId: number, assignmentId: number, body: string, signal: AbortSignal): Promise<Submission>;
}

const courseSchema = z.object({ id: z.number(), name: z.string(), course_code: z.string().optional() });
const assignmentSchema = z.object({
  id: z.number(),
  name: z.string(),
  due_at: z.string().nullable().default(null),
  points_possible: z.number().nullable().default(null),
});
const submissionSchema = z.object({ id: z.number(), assignment_id: z.number(), workflow_state: z.string() });

/**
 * Thin REST client for the Canvas LMS API. One request per call: no paging
 * beyond `per_page`, no backoff. Rate limits and 5xx come back as transient
 * ModuleErrors and the orchestrator decides whether to retry.
 */
export class HttpCanvasClient implements CanvasClient {
  constructor(private baseUrl: string, private token: string, private perPage = 100) {}

  listCourses(signal: AbortSignal): Promise<Course[]> {
    return this.request(`/api/v1/courses?enrollment_state=active&per_page=${this.perPage}`, z.array(courseSchema), { signal });
  }

  listAssignments(courseId: number, signal: AbortSignal): Promise<Assignment[]> {
    return this.request(`/api/v1/courses/${courseId}/assignments?per_page=${this.perPage}`, z.array(assignmentSchema), { signal });
  }

  submitText(courseId: number, assignmentId: number, body: string, signal: AbortSignal): Promise<Submission> {
    const form = new URLSearchParams({
      "submission[submission_type]": "online_text_entry",
      "submission[body]": body,
    });
    return this.request(`/api/v1/courses/${courseId}/assignments/${assignmentId}/submissions`, submissionSchema, {
      method: "POST",
      body: form,
      signal,
    });
  }

  private async request<S extends z.ZodTypeAny>(
    pathAndQuery: string,
    schema: S,
    init: { method?: string; body?: URLSearchParams; signal: AbortSignal }
  ): Promise<z.infer<S>> {
    const url = `${this.baseUrl.replace(/\/+$/, "")}${pathAndQuery}`;
    let res: Response;
    try {
      res = await fetch(url, {
        method: init.method ?? "GET",
        headers: { authorization: `Bearer ${this.token}`, accept: "application/json" },
        body: init.body,
        signal: init.signal,
      });
    } catch (err) {
      if (init.signal.aborted) throw err;
      throw new ModuleError(`canvas request failed: ${err instanceof Error ? err.message : String(err)}`, true, { cause: err });
    }
    if (!res.ok) {
      const text = await res.text();
      const transient = res.status === 429 || res.status >= 500;
      throw new ModuleError(`canvas HTTP ${res.status}: ${text.slice(0, 200)}`, transient);
    }
    const parsed = schema.safeParse(await res.json());
    if (!parsed.success) throw new ModuleError(`unexpected canvas response from ${pathAndQuery}`);
    return parsed.data;
  }
}
