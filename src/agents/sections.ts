import type { DocumentType, SectionSpec } from '../types.js';
import { allOf, minLength, minListItems, orderedMilestones } from './validators.js';

export const SECTION_SPECS: readonly SectionSpec[] = [
  {
    id: 'executive_summary',
    title: 'Executive Summary',
    ordinal: 0,
    required: true,
    rolePrompt: [
      'Write the executive summary of the document.',
      'State the business problem, the proposed solution and the expected outcomes in plain language.',
      'Name the primary stakeholders and the single most important success criterion.',
    ].join('\n'),
    validate: minLength(200),
  },
  {
    id: 'project_scope',
    title: 'Project Scope and Objectives',
    ordinal: 1,
    required: true,
    rolePrompt: [
      'Define the project scope and its business objectives.',
      'List what is in scope and what is explicitly out of scope.',
      'Give each objective a measurable success indicator.',
    ].join('\n'),
    validate: minLength(200),
  },
  {
    id: 'stakeholder_analysis',
    title: 'Stakeholder Analysis',
    ordinal: 2,
    required: true,
    rolePrompt: [
      'Identify the stakeholders as a bullet list.',
      'For each stakeholder give their role, their interest in the project and their influence.',
    ].join('\n'),
    validate: allOf(minLength(150), minListItems(2, 'stakeholders')),
  },
  {
    id: 'requirements',
    title: 'Functional and Technical Requirements',
    ordinal: 3,
    required: true,
    rolePrompt: [
      'Specify the functional requirements (what the system must do) and the technical and non-functional requirements',
      '(performance, security, integrations, platforms) as bullet lists under "Functional" and "Technical" sub-headings.',
      'Each requirement must be testable.',
    ].join('\n'),
    validate: allOf(minLength(300), minListItems(4, 'requirements')),
  },
  {
    id: 'timeline',
    title: 'Timeline and Milestones',
    ordinal: 4,
    required: true,
    rolePrompt: [
      'Lay out the delivery timeline as a numbered list of milestones in chronological order.',
      'Give each milestone an estimated duration and its main deliverable.',
    ].join('\n'),
    validate: allOf(minLength(150), orderedMilestones(2)),
  },
  {
    id: 'budget',
    title: 'Budget Considerations',
    ordinal: 5,
    required: true,
    rolePrompt: [
      'Describe the main cost drivers (people, infrastructure, licences, third-party services).',
      'Give order-of-magnitude estimates where the requirements allow it and state the assumptions behind them.',
    ].join('\n'),
    validate: minLength(150),
  },
  {
    id: 'risk_assessment',
    title: 'Risk Assessment',
    ordinal: 6,
    required: true,
    rolePrompt: [
      'List the key risks as bullets.',
      'For each risk give its likelihood, its impact and a concrete mitigation.',
    ].join('\n'),
    validate: allOf(minLength(200), minListItems(3, 'risks')),
  },
  {
    id: 'assumptions',
    title: 'Assumptions and Dependencies',
    ordinal: 7,
    required: true,
    rolePrompt: [
      'List the assumptions the plan relies on and the external dependencies (teams, vendors, systems, approvals) as bullets.',
    ].join('\n'),
    validate: allOf(minLength(100), minListItems(2, 'assumptions or dependencies')),
  },
  {
    id: 'next_steps',
    title: 'Next Steps and Recommendations',
    ordinal: 8,
    required: true,
    rolePrompt: [
      'Recommend the immediate next steps as a bullet list, each with an owner role.',
      'Close with the decisions stakeholders must take before work can start.',
    ].join('\n'),
    validate: allOf(minLength(100), minListItems(2, 'next steps')),
  },
];

export const SOW_SECTION_SPECS: readonly SectionSpec[] = [
  {
    id: 'sow_overview',
    title: 'Project Overview',
    ordinal: 0,
    required: true,
    rolePrompt: [
      'Summarise the engagement: the client need, the purpose of the work and the intended outcome.',
      'State the scope boundaries and the objectives the work must meet.',
    ].join('\n'),
    validate: minLength(200),
  },
  {
    id: 'sow_deliverables',
    title: 'Deliverables',
    ordinal: 1,
    required: true,
    rolePrompt: [
      'List every deliverable as a bullet.',
      'For each deliverable give a short description and its acceptance criteria.',
    ].join('\n'),
    validate: allOf(minLength(150), minListItems(3, 'deliverables')),
  },
  {
    id: 'sow_schedule',
    title: 'Project Schedule',
    ordinal: 2,
    required: true,
    rolePrompt: [
      'Lay out the schedule as a numbered list of phases or milestones in chronological order.',
      'Give each an estimated duration and the dependencies that gate it.',
    ].join('\n'),
    validate: allOf(minLength(150), orderedMilestones(2)),
  },
  {
    id: 'sow_resources',
    title: 'Resource Requirements',
    ordinal: 3,
    required: true,
    rolePrompt: [
      'Describe the team structure and roles, the tools and environments needed, and what the client must provide.',
      'Use a bullet list for roles.',
    ].join('\n'),
    validate: allOf(minLength(150), minListItems(2, 'roles or resources')),
  },
  {
    id: 'sow_management',
    title: 'Project Management',
    ordinal: 4,
    required: true,
    rolePrompt: [
      'Describe how the work will be run: reporting cadence, communication channels, quality checks and risk handling.',
      'Explain how change requests are raised and approved.',
    ].join('\n'),
    validate: minLength(150),
  },
  {
    id: 'sow_terms',
    title: 'Terms and Conditions',
    ordinal: 5,
    required: true,
    rolePrompt: [
      'Set out the commercial terms as bullets: payment schedule, acceptance process, change control, termination and intellectual property.',
      'Mark terms the requirements do not settle as assumptions to confirm.',
    ].join('\n'),
    validate: allOf(minLength(150), minListItems(3, 'terms')),
  },
  {
    id: 'sow_next_steps',
    title: 'Next Steps',
    ordinal: 6,
    required: true,
    rolePrompt: [
      'List the actions needed to sign and start the engagement as bullets, each with an owner role.',
    ].join('\n'),
    validate: allOf(minLength(100), minListItems(2, 'next steps')),
  },
];

export const FRD_SECTION_SPECS: readonly SectionSpec[] = [
  {
    id: 'frd_system_overview',
    title: 'System Overview',
    ordinal: 0,
    required: true,
    rolePrompt: [
      'Describe the system: its purpose, its users, its main components and how it fits with existing systems.',
    ].join('\n'),
    validate: minLength(200),
  },
  {
    id: 'frd_functional',
    title: 'Functional Requirements',
    ordinal: 1,
    required: true,
    rolePrompt: [
      'List the functional requirements as bullets grouped under sub-headings per user role or business process.',
      'Write each requirement as a testable "The system shall ..." statement.',
    ].join('\n'),
    validate: allOf(minLength(300), minListItems(4, 'requirements')),
  },
  {
    id: 'frd_features',
    title: 'System Features',
    ordinal: 2,
    required: true,
    rolePrompt: [
      'Describe the main features as bullets.',
      'For each feature give the user goal it serves and its priority (must, should, could).',
    ].join('\n'),
    validate: allOf(minLength(150), minListItems(3, 'features')),
  },
  {
    id: 'frd_technical',
    title: 'Technical Requirements',
    ordinal: 3,
    required: true,
    rolePrompt: [
      'Specify platforms, performance targets, security controls, integrations and operational constraints as bullets.',
    ].join('\n'),
    validate: allOf(minLength(200), minListItems(3, 'technical requirements')),
  },
  {
    id: 'frd_user_interface',
    title: 'User Interface',
    ordinal: 4,
    required: true,
    rolePrompt: [
      'Describe the key screens, navigation and interactions.',
      'Note accessibility and responsiveness expectations.',
    ].join('\n'),
    validate: minLength(150),
  },
  {
    id: 'frd_data',
    title: 'Data Requirements',
    ordinal: 5,
    required: true,
    rolePrompt: [
      'Describe the main data entities and their key attributes, the data flows between components, retention and privacy rules.',
    ].join('\n'),
    validate: minLength(150),
  },
  {
    id: 'frd_testing',
    title: 'Testing Requirements',
    ordinal: 6,
    required: true,
    rolePrompt: [
      'List the test levels and acceptance criteria as bullets, including the data and environments each needs.',
    ].join('\n'),
    validate: allOf(minLength(150), minListItems(3, 'test requirements')),
  },
];

export type SectionSets = Readonly<Record<DocumentType, readonly SectionSpec[]>>;

export const SECTION_SETS: SectionSets = {
  brd: SECTION_SPECS,
  sow: SOW_SECTION_SPECS,
  frd: FRD_SECTION_SPECS,
};

/** Every spec of every document type; section ids are unique across sets. */
export const ALL_SECTION_SPECS: readonly SectionSpec[] = [
  ...SECTION_SPECS,
  ...SOW_SECTION_SPECS,
  ...FRD_SECTION_SPECS,
];

export const DOCUMENT_TYPE_NAMES: Record<DocumentType, string> = {
  brd: 'Business Requirements Document',
  sow: 'Statement of Work',
  frd: 'Functional Requirements Document',
};

/** The ordered section set for a document type. */
export function sectionSpecsFor(docType: DocumentType, sets: SectionSets = SECTION_SETS): SectionSpec[] {
  return [...sets[docType]].sort((a, b) => a.ordinal - b.ordinal);
}

/** Deterministic content used when a section cannot be generated. */
export function buildPlaceholder(spec: Pick<SectionSpec, 'title'>): string {
  return [
    `[Section unavailable] The "${spec.title}" section could not be generated automatically.`,
    'Review the project requirements and complete this section manually.',
  ].join(' ');
}
