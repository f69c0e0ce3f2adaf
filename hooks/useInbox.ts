import { useCallback, useEffect, useSyncExternalStore } from "react";
import type { InboxController, InboxState } from "@/lib/inbox/controller";
import type { ConversationStatus, StatusFilter } from "@/lib/status";

interface UseInboxOptions {
    /** Start on mount and dispose on unmount (default true) */
    manageLifecycle?: boolean;
}

interface UseInboxResult {
    state: InboxState;
    selectConversation: InboxController["selectConversation"];
    loadOlderMessages: InboxController["loadOlderMessages"];
    changeStatusFilter: InboxController["changeStatusFilter"];
    changeRoleFilter: InboxController["changeRoleFilter"];
    search: InboxController["search"];
    sendMessage: InboxController["sendMessage"];
    updateConversationStatus: InboxController["updateConversationStatus"];
    dismissNotice: InboxController["dismissNotice"];
}

/**
 * Binds an InboxController to a component.
 * - Re-renders on every state-changed event
 * - Starts the controller on mount, disposes it on unmount
 * - Actions are bound to the controller so they can be passed down as props
 */
export function useInbox(controller: InboxController, { manageLifecycle = true }: UseInboxOptions = {}): UseInboxResult {
    const subscribe = useCallback(
        (onStoreChange: () => void) => controller.on("state-changed", () => onStoreChange()),
        [controller]
    );

    const state = useSyncExternalStore(subscribe, controller.getState, controller.getState);

    useEffect(() => {
        if (!manageLifecycle) return;

        void controller.start();
        return () => {
            void controller.dispose();
        };
    }, [controller, manageLifecycle]);

    return {
        state,
        selectConversation: useCallback((id: string) => controller.selectConversation(id), [controller]),
        loadOlderMessages: useCallback(() => controller.loadOlderMessages(), [controller]),
        changeStatusFilter: useCallback((status: StatusFilter | string) => controller.changeStatusFilter(status), [controller]),
        changeRoleFilter: useCallback((role: string | null) => controller.changeRoleFilter(role), [controller]),
        search: useCallback((query: string) => controller.search(query), [controller]),
        sendMessage: useCallback((text: string) => controller.sendMessage(text), [controller]),
        updateConversationStatus: useCallback(
            (id: string, status: ConversationStatus) => controller.updateConversationStatus(id, status),
            [controller]
        ),
        dismissNotice: useCallback((id: string) => controller.dismissNotice(id), [controller]),
    };
}
