/**
 * @file src/tools/due-date-tools.ts
 * @summary manage_due_dates: create, list, update and delete the deadlines that cohort tags
 * point at. A created due date without a tag gets `test-<topic>-<date>`.
 *
 * @exports
 *   - manageDueDatesTool — registry entry
 */

import { ValidationError } from "../core/errors";
import { encodeDueDate } from "../core/store-codec";
import { jsonResult, type ToolEntry } from "./results";
import { DUE_DATE_ACTIONS, manageDueDatesArgs, parseToolArgs } from "./schemas";

export const manageDueDatesTool: ToolEntry = {
  definition: {
    name: "manage_due_dates",
    description: "Create, list, update or delete due dates for tests and deadlines",
    inputSchema: {
      type: "object",
      properties: {
        action: { type: "string", enum: [...DUE_DATE_ACTIONS], description: "Operation to perform" },
        topic: { type: "string", description: "Name of the test or deadline (create, update)" },
        date: { type: "string", description: "Due date as YYYY-MM-DD (create, update)" },
        tag: { type: "string", description: "Tag linking cards to the due date (optional)" },
        due_date_id: { type: "string", description: "ID of the due date (update, delete)" },
      },
      required: ["action"],
    },
  },
  handler: async (service, raw) => {
    const args = parseToolArgs("manage_due_dates", manageDueDatesArgs, raw);

    switch (args.action) {
      case "create": {
        if (!args.topic || !args.date) {
          throw new ValidationError("Missing required parameters for create: topic, date (YYYY-MM-DD)");
        }
        const created = await service.createDueDate({ topic: args.topic, date: args.date, tag: args.tag });
        return jsonResult(encodeDueDate(created));
      }
      case "list": {
        const dueDates = await service.listDueDates();
        return jsonResult(dueDates.map(encodeDueDate));
      }
      case "update": {
        if (!args.due_date_id) throw new ValidationError("Missing required parameter for update: due_date_id");
        const updated = await service.updateDueDate(args.due_date_id, {
          topic: args.topic,
          date: args.date,
          tag: args.tag,
        });
        return jsonResult(encodeDueDate(updated));
      }
      case "delete": {
        if (!args.due_date_id) throw new ValidationError("Missing required parameter for delete: due_date_id");
        await service.deleteDueDate(args.due_date_id);
        return jsonResult({ message: `Due date ${args.due_date_id} deleted successfully` });
      }
    }
  },
};
