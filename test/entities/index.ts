export { Customer, createCustomer, customerMapping } from "./Customer";
export { Order, createOrder, orderMapping } from "./Order";
