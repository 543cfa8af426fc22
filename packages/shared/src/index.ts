export * from "./proxy/index.js";
export * from "./relay/index.js";
export * from "./tasks/index.js";

export interface ProjectSummary {
  name: string;
  description: string;
  principles: string[];
}

export function describeProject(): ProjectSummary {
  return {
    name: "Read Along",
    description:
      "Classroom reading assistant with word-synchronized speech and a live teacher-to-student relay.",
    principles: [
      "Learner-First Accessibility",
      "Keys Stay On The Server",
      "Nothing Outlives The Lesson"
    ]
  };
}
