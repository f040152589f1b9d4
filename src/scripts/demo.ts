import { createContainer, type Container } from '../infra/container.js';
import { isAvailable } from '../domain/products/product.js';

function describeError(error: unknown): string {
  return error instanceof Error ? `${error.name}: ${error.message}` : String(error);
}

async function runUserExamples({ services }: Container): Promise<void> {
  const { userService } = services;
  console.log('=== Users ===');

  const user = await userService.createUser({
    id: 'user-001',
    email: 'ada@example.com',
    name: 'Ada Lovelace',
  });
  console.log(`Created user ${user.id} (${user.email})`);

  try {
    await userService.createUser({ id: 'u1', email: 'short@example.com', name: 'Short Id' });
  } catch (error) {
    console.log(`Rejected as expected -> ${describeError(error)}`);
  }

  const updated = await userService.updateUser('user-001', { name: 'Ada King' });
  console.log(`Renamed user to ${updated.name}`);

  await userService.deactivateUser('user-001');
  const reactivated = await userService.activateUser('user-001');
  console.log(`User active again: ${reactivated.isActive}`);
  console.log();
}

async function runProductExamples({ services }: Container): Promise<void> {
  const { productService } = services;
  console.log('=== Products ===');

  const product = await productService.createProduct({
    id: 'prod-001',
    name: 'Mechanical Keyboard',
    description: 'Tenkeyless, brown switches',
    category: 'peripherals',
    price: 89.9,
    stock: 10,
  });
  console.log(`Created product ${product.id} with stock ${product.stock}`);

  await productService.addStock('prod-001', 5);
  const restocked = await productService.addStock('prod-001', 10);
  console.log(`Stock after two deliveries: ${restocked.stock}`);

  try {
    await productService.removeStock('prod-001', 30);
  } catch (error) {
    console.log(`Rejected as expected -> ${describeError(error)}`);
  }

  const inactive = await productService.deactivateProduct('prod-001');
  console.log(`Available while inactive: ${isAvailable(inactive)}`);
  const active = await productService.activateProduct('prod-001');
  console.log(`Available once active: ${isAvailable(active)}`);
  console.log();
}

async function runManagementExamples({ services }: Container): Promise<void> {
  const { userManagementService, productManagementService } = services;
  console.log('=== Management ===');

  const users = await userManagementService.bulkCreateUsers([
    { id: 'user-002', email: 'grace@example.com', name: 'Grace Hopper' },
    { id: 'user-003', email: 'not-an-email', name: 'Broken Input' },
    { id: 'user-004', email: 'alan@example.com', name: 'Alan Turing' },
  ]);
  console.log(`Bulk created ${users.items.length} users, ${users.errors.length} failed`);
  for (const failure of users.errors) {
    console.log(`  #${failure.index}: ${failure.message}`);
  }

  await productManagementService.bulkCreateProducts([
    { id: 'prod-002', name: 'USB Hub', description: '', category: 'peripherals', price: 25, stock: 0 },
    { id: 'prod-003', name: 'Desk Lamp', description: 'LED', category: 'office', price: 40, stock: 3 },
  ]);

  console.log('User statistics:', await userManagementService.getUserStatistics());
  console.log('Product statistics:', await productManagementService.getProductStatistics());
  console.log('Products per category:', await productManagementService.getCategoryStatistics());
}

export async function runDemo(container: Container = createContainer()): Promise<void> {
  console.log('=== Hexagonal architecture with Repository and Factory patterns ===');
  console.log();

  await runUserExamples(container);
  await runProductExamples(container);
  await runManagementExamples(container);
}

// Run if called directly
if (import.meta.url === `file://${process.argv[1]}` || process.argv[1]?.endsWith('demo.ts')) {
  runDemo()
    .then(() => {
      console.log('Done.');
    })
    .catch((error) => {
      console.error('Demo failed:', error);
      process.exitCode = 1;
    });
}
