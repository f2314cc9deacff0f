import type { NewCustomer, NewOrder, NewOrderItem, NewProduct } from './schema'

const day = (iso: string) => new Date(`${iso}T00:00:00Z`)

// Sofia Rossi has no orders; her join date comes from the column default.
export const seedCustomers: NewCustomer[] = [
  { id: 1, firstName: 'Maya', lastName: 'Chen', email: 'maya.chen@example.com', joinDate: day('2023-03-14') },
  { id: 2, firstName: 'Liam', lastName: 'Ortiz', email: 'liam.ortiz@example.com', joinDate: day('2023-06-02') },
  { id: 3, firstName: 'Priya', lastName: 'Nair', email: 'priya.nair@example.com', joinDate: day('2023-09-21') },
  { id: 4, firstName: 'Jonas', lastName: 'Berg', email: 'jonas.berg@example.com', joinDate: day('2023-11-30') },
  { id: 5, firstName: 'Sofia', lastName: 'Rossi', email: 'sofia.rossi@example.com' },
]

export const seedProducts: NewProduct[] = [
  { id: 1, name: 'Wireless Mouse', category: 'Electronics', price: 25, stockQuantity: 150 },
  { id: 2, name: 'Mechanical Keyboard', category: 'Electronics', price: 89.5, stockQuantity: 60 },
  { id: 3, name: 'Noise-Cancelling Headphones', category: 'Electronics', price: 199, stockQuantity: 25 },
  { id: 4, name: 'Standing Desk', category: 'Furniture', price: 349, stockQuantity: 10 },
  { id: 5, name: 'Ergonomic Chair', category: 'Furniture', price: 250, stockQuantity: 15 },
  { id: 6, name: 'Notebook Set', category: 'Stationery', price: 12.75, stockQuantity: 300 },
]

export const seedOrders: NewOrder[] = [
  { id: 1, customerId: 1, orderDate: day('2024-01-15'), status: 'Delivered' },
  { id: 2, customerId: 2, orderDate: day('2024-02-03'), status: 'Delivered' },
  { id: 3, customerId: 1, orderDate: day('2024-02-20'), status: 'Shipped' },
  { id: 4, customerId: 3, orderDate: day('2024-03-05'), status: 'Pending' },
  { id: 5, customerId: 4, orderDate: day('2024-03-18'), status: 'Delivered' },
  { id: 6, customerId: 2, orderDate: day('2024-04-01'), status: 'Cancelled' },
]

// Item 1 was sold before the mouse went from 22.50 to 25.00
export const seedOrderItems: NewOrderItem[] = [
  { id: 1, orderId: 1, productId: 1, quantity: 2, unitPrice: 22.5 },
  { id: 2, orderId: 1, productId: 2, quantity: 1, unitPrice: 89.5 },
  { id: 3, orderId: 2, productId: 4, quantity: 1, unitPrice: 349 },
  { id: 4, orderId: 3, productId: 3, quantity: 1, unitPrice: 199 },
  { id: 5, orderId: 3, productId: 6, quantity: 4, unitPrice: 12.75 },
  { id: 6, orderId: 4, productId: 5, quantity: 2, unitPrice: 250 },
  { id: 7, orderId: 5, productId: 6, quantity: 10, unitPrice: 12.75 },
  { id: 8, orderId: 5, productId: 1, quantity: 1, unitPrice: 25 },
  { id: 9, orderId: 6, productId: 2, quantity: 2, unitPrice: 89.5 },
]
