export const STATUSES = [
  'discussions',
  'likely_accept',
  'likely_decline',
  'accepted',
  'declined',
  'hold',
  'active',
] as const

export type Status = (typeof STATUSES)[number]

// '' means the proposal had never been observed before this change
export type PreviousStatus = Status | ''

export interface ProposalMention {
  issueNumber: number
  title: string
  currentStatus: Status
  changedAt: Date  // meeting date, UTC midnight
}

export interface ProposalChange extends ProposalMention {
  previousStatus: PreviousStatus
  commentUrl: string
  relatedIssues: number[]
}

export interface MeetingComment {
  id: number
  body: string
  createdAt: Date
  updatedAt: Date | null
  htmlUrl: string
}

export interface CommentPointer {
  id: number
  effectiveAt: Date
}

export interface PersistentState {
  lastProcessedAt: Date
  lastCommentId: string
  isFresh: boolean  // no state file yet — never written to disk
}

// ─── Content files ────────────────────────────────────────────────────────────

export interface Link {
  title: string
  url: string
}

export interface ProposalContent {
  issueNumber: number
  title: string
  previousStatus: PreviousStatus
  currentStatus: Status
  changedAt: Date
  commentUrl: string
  summary: string
  links: Link[]
}

export interface WeeklyContent {
  year: number
  week: number
  proposals: ProposalContent[]
  createdAt: Date | null
}
