/**
 * The crew's task list for a project, and which earlier outputs each task
 * sees as context.
 */

import type { AgentRole } from '../agents/index.js';
import type { ProjectType } from '../templates.js';

export type TaskKey = 'planning' | 'requirements' | 'backend' | 'frontend' | 'testing' | 'deployment' | 'handoff';

export interface ProjectBrief {
  name: string;
  type: ProjectType;
  description: string;
}

export interface PlannedTask {
  id: TaskKey;
  agent: AgentRole;
  title: string;
  description: string;
  expectedOutput: string;
  /** Tasks whose stored outputs are forwarded, in this order */
  contextIds: TaskKey[];
  /** Markdown report path, relative to the project directory */
  outputFile: string;
  /** Where code blocks from this task are written, relative to the project directory */
  codeDir: string;
}

const HAS_BACKEND: readonly ProjectType[] = ['ecommerce', 'dashboard', 'api'];
const HAS_FRONTEND: readonly ProjectType[] = ['ecommerce', 'landing', 'dashboard'];

export function hasBackend(type: ProjectType): boolean {
  return HAS_BACKEND.includes(type);
}

export function hasFrontend(type: ProjectType): boolean {
  return HAS_FRONTEND.includes(type);
}

export function describeProject(project: ProjectBrief): string {
  return project.description.trim() || `A ${project.type} project for a small or medium-sized business`;
}

export function buildTaskPlan(project: ProjectBrief): PlannedTask[] {
  const { name, type } = project;
  const client = describeProject(project);
  const tasks: PlannedTask[] = [];

  tasks.push({
    id: 'planning',
    agent: 'project_manager',
    title: 'Project planning',
    description: `Create a project plan for: ${name}
Project type: ${type}
Client description: ${client}

Define the scope and objectives, timeline and milestones, team coordination,
risks and success criteria.`,
    expectedOutput: 'Project plan with timeline, milestones and risk assessment',
    contextIds: [],
    outputFile: 'docs/PROJECT_PLAN.md',
    codeDir: '.',
  });

  tasks.push({
    id: 'requirements',
    agent: 'business_analyst',
    title: 'Requirements analysis',
    description: `Analyse the requirements for: ${name}
Project type: ${type}
Client needs: ${client}

Deliver functional requirements, user stories with acceptance criteria,
technical recommendations and wireframe suggestions.`,
    expectedOutput: 'Requirements document with user stories and technical specifications',
    contextIds: ['planning'],
    outputFile: 'docs/REQUIREMENTS.md',
    codeDir: '.',
  });

  const development: TaskKey[] = [];

  if (hasBackend(type)) {
    tasks.push({
      id: 'backend',
      agent: 'backend',
      title: 'Backend design and implementation',
      description: `Design and implement the backend for: ${name}

From the requirements, create the API architecture and endpoints, the database
schema, authentication, the business logic and the API documentation.
Write source files relative to the backend/ directory.`,
      expectedOutput: 'Backend implementation with API, database and documentation',
      contextIds: ['requirements'],
      outputFile: 'docs/BACKEND.md',
      codeDir: 'backend',
    });
    development.push('backend');
  }

  if (hasFrontend(type)) {
    // Landing pages have no backend to integrate with
    const backendContext: TaskKey[] = hasBackend(type) ? ['backend'] : [];
    tasks.push({
      id: 'frontend',
      agent: 'frontend',
      title: 'Frontend implementation',
      description: `Create the frontend application for: ${name}
Project type: ${type}

Implement a responsive interface, the component architecture, API integration
(if there is a backend), forms with validation and navigation.
Write source files relative to the frontend/ directory.`,
      expectedOutput: 'Frontend application with responsive design and all features',
      contextIds: ['requirements', ...backendContext],
      outputFile: 'docs/FRONTEND.md',
      codeDir: 'frontend',
    });
    development.push('frontend');
  }

  tasks.push({
    id: 'testing',
    agent: 'qa',
    title: 'Testing and QA',
    description: `Create tests for: ${name}

Provide a test plan, unit tests, integration tests, a coverage report,
a bug report if any, and a quality sign-off.
Write test files relative to the tests/ directory.`,
    expectedOutput: 'Test suite with coverage report and quality assessment',
    contextIds: development,
    outputFile: 'docs/TEST_PLAN.md',
    codeDir: 'tests',
  });

  tasks.push({
    id: 'deployment',
    agent: 'devops',
    title: 'Deployment setup',
    description: `Set up deployment for: ${name}

Create Dockerfiles, docker-compose.yml, a GitHub Actions CI/CD pipeline,
Nginx configuration, deployment documentation and an environment setup guide.
Write files relative to the project root.`,
    expectedOutput: 'Deployment configuration with Docker, CI/CD and documentation',
    contextIds: ['testing'],
    outputFile: 'docs/DEPLOYMENT.md',
    codeDir: '.',
  });

  tasks.push({
    id: 'handoff',
    agent: 'project_manager',
    title: 'Documentation and handoff',
    description: `Create the final documentation and handoff package for: ${name}

Compile the project documentation, setup and installation guide, user manual,
deployment guide, maintenance recommendations and future enhancements.`,
    expectedOutput: 'Project documentation package ready for client handoff',
    contextIds: tasks.map(task => task.id),
    outputFile: 'README.md',
    codeDir: '.',
  });

  return tasks;
}

/** Directory name for a project, e.g. "Tienda de Ropa" → "tienda-de-ropa" */
export function toProjectSlug(name: string): string {
  const slug = name
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
  return slug || 'project';
}
