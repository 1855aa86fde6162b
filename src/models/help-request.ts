export enum HelpRequestStatus {
    PENDING = 'pending',
    IN_PROGRESS = 'in_progress',
    RESOLVED = 'resolved',
    ESCALATED = 'escalated'
}

export interface CustomerContext {
    timestamp: string;
    roomName: string | null;
    bookingProgress: {
        customerName: string | null;
        service: string | null;
        appointmentDate: string | null;
        appointmentTime: string | null;
        isComplete: boolean;
    };
    conversationState: string;
    previousQueries: { query: string; timestamp: string }[];
}

export interface HelpRequest {
    id: string;
    question: string;
    answer: string | null;
    status: HelpRequestStatus;
    roomName: string | null;
    customerContext: CustomerContext | null;
    createdAt: string;
    updatedAt: string;
    resolutionNotes: string | null;
    responseTimeSeconds: number | null;
    resolvedBy: string | null;
    resolvedAt: string | null;
}

export interface SupervisorResponse {
    answer: string;
    resolutionNotes?: string | null;
    addToKnowledgeBase: boolean;
    kbCategory: string;
}

export interface HelpRequestCreatedEvent {
    event: 'help_request_created';
    request_id: string;
    question: string;
    room_name: string | null;
    created_at: string;
}

export interface HelpRequestResolvedEvent {
    event: 'help_request_resolved';
    request_id: string;
    room_name: string | null;
    original_question: string;
    answer: string;
}

export interface ResolutionResult extends HelpRequestResolvedEvent {
    response_time_seconds: number;
    added_to_knowledge_base: boolean;
}
