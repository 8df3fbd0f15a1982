import { defineMapping } from "../../src";

/**
 * Customer entity with a database-generated identifier.
 * `active` is written as 1/0 and read back as a number.
 */
export class Customer {
  id: number | null = null;
  name = "";
  email = "";
  tier: "standard" | "gold" = "standard";
  active: boolean | number = true;
}

export const customerMapping = defineMapping({
  entity: Customer,
  table: "customers",
  id: "id",
  columns: ["id", "name", "email", "tier", "active"],
});

export const createCustomer = (fields: Partial<Customer> = {}): Customer =>
  Object.assign(new Customer(), fields);
