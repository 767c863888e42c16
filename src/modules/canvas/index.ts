import { ModuleError } from "../../errors.js";
import type { CapabilityDescriptor, ExecutionResult, Parameters, ParamValue } from "../../types/intent.js";
import type { CapabilityModule, ExecutionContext } from "../../types/modules.js";
import type { CanvasClient, Course } from "./client.js";

export const canvasDescriptor: CapabilityDescriptor = {
  name: "canvas",
  description: "Courses and assignments on the Canvas learning platform",
  actions: {
    list_courses: { description: "List active courses", parameters: {} },
    find_course: {
      description: "Find a course by (part of) its name or code",
      parameters: { name: { type: "string", required: true } },
    },
    list_assignments: {
      description: "List the assignments of a course",
      parameters: { course_id: { type: "number", required: true } },
    },
    submit_assignment: {
      description: "Submit a text entry for an assignment",
      parameters: {
        course_id: { type: "number", required: true },
        assignment_id: { type: "number", required: true },
        body: { type: "string", required: true },
      },
    },
  },
  destructiveActions: ["submit_assignment"],
  idempotentActions: ["list_courses", "find_course", "list_assignments"],
};

export class CanvasModule implements CapabilityModule {
  readonly descriptor = canvasDescriptor;

  constructor(private client: CanvasClient) {}

  async execute(action: string, params: Parameters, ctx: ExecutionContext): Promise<ExecutionResult> {
    switch (action) {
      case "list_courses": {
        const courses = await this.client.listCourses(ctx.signal);
        const only = courses.length === 1 ? courses[0] : undefined;
        return {
          summary: `${courses.length} active course${courses.length === 1 ? "" : "s"}`,
          output: courses,
          facts: only ? courseFacts(only) : undefined,
        };
      }
      case "find_course": {
        const needle = text(params, "name").toLowerCase();
        const courses = await this.client.listCourses(ctx.signal);
        const hits = courses.filter(c =>
          c.name.toLowerCase().includes(needle) || (c.course_code ?? "").toLowerCase().includes(needle)
        );
        if (hits.length === 0) throw new ModuleError(`no course matches '${needle}'`);
        if (hits.length > 1) {
          throw new ModuleError(`'${needle}' matches ${hits.length} courses: ${hits.map(c => c.name).join(", ")}`);
        }
        return { summary: `found ${hits[0].name} (${hits[0].id})`, output: hits[0], facts: courseFacts(hits[0]) };
      }
      case "list_assignments": {
        const courseId = id(params, "course_id");
        const assignments = await this.client.listAssignments(courseId, ctx.signal);
        return {
          summary: `${assignments.length} assignment${assignments.length === 1 ? "" : "s"} in course ${courseId}`,
          output: assignments,
          facts: { "canvas.course_id": courseId },
        };
      }
      case "submit_assignment": {
        const courseId = id(params, "course_id");
        const assignmentId = id(params, "assignment_id");
        const submission = await this.client.submitText(courseId, assignmentId, text(params, "body"), ctx.signal);
        return {
          summary: `submitted assignment ${assignmentId} (${submission.workflow_state})`,
          output: submission,
          facts: { "canvas.course_id": courseId, "canvas.assignment_id": assignmentId },
        };
      }
      default:
        throw new ModuleError(`unsupported canvas action: ${action}`);
    }
  }
}

function courseFacts(c: Course): Record<string, ParamValue> {
  return { "canvas.course_id": c.id, "canvas.course_name": c.name };
}

function id(params: Parameters, name: string): number {
  const v = params[name];
  if (typeof v !== "number" || !Number.isInteger(v)) throw new ModuleError(`parameter '${name}' must be an integer id`);
  return v;
}

function text(params: Parameters, name: string): string {
  const v = params[name];
  if (typeof v !== "string" || !v) throw new ModuleError(`missing parameter '${name}'`);
  return v;
}
